import express from 'express';
import { createAnalysisController } from '../controllers/analysisController';
import type { AnalysisService } from '../services/analysisService';

export function createAnalysisRoutes(service: AnalysisService) {
    const router = express.Router();
    const controller = createAnalysisController(service);

    // Analyze an uploaded PDF/DOCX resume
    router.post('/', controller.analyzeUpload);

    // Analyze resume text that was extracted earlier
    router.post('/text', controller.analyzeText);

    return router;
}

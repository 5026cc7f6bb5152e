import { Request, Response, RequestHandler } from 'express';
import multer from 'multer';
import { config } from '../config/app';
import { ParsedDocument, SECTION_KEYS, emptySections } from '../models/ParsedDocument';
import type { AnalysisService } from '../services/analysisService';
import { createErrorResponse, createSuccessResponse, toAnalysisBody, toUploadAnalysisBody } from '../utils/apiResponse';
import { ErrorCodes } from '../utils/errors';
import { asyncHandler } from '../middleware/errorHandler';
import { validateRequest } from '../middleware/validateRequest';

// Uploaded bytes stay in memory; storing them is the caller's concern
const upload = multer({
    storage: multer.memoryStorage(),
    limits: {
        fileSize: config.upload.maxFileSize
    }
});

function toStringArray(value: unknown): string[] {
    return Array.isArray(value) ? value.filter((item): item is string => typeof item === 'string') : [];
}

/**
 * Rebuilds a parsed document from a JSON body; unknown sections are ignored
 * and missing ones are empty.
 */
export function documentFromBody(resumeText: string, sections: unknown): ParsedDocument {
    const result = emptySections();
    if (typeof sections === 'object' && sections !== null) {
        for (const key of SECTION_KEYS) {
            const entry = Object.entries(sections).find(([name]) => name === key);
            result[key] = entry ? toStringArray(entry[1]) : [];
        }
    }
    return { rawText: resumeText, contact: {}, sections: result };
}

export function createAnalysisController(service: AnalysisService) {
    /**
     * Multipart upload: `resume` file plus `jobDescription` field.
     */
    const analyzeUpload: RequestHandler[] = [
        upload.single('resume'),

        validateRequest({
            body: {
                jobDescription: { type: 'string', required: true }
            }
        }),

        asyncHandler(async (req: Request, res: Response) => {
            if (!req.file) {
                res.status(400).json(createErrorResponse(ErrorCodes.VALIDATION_ERROR, 'No resume file uploaded'));
                return;
            }

            const result = await service.analyzeUpload(
                {
                    buffer: req.file.buffer,
                    mimeType: req.file.mimetype,
                    originalName: req.file.originalname
                },
                String(req.body.jobDescription)
            );

            res.status(201).json(createSuccessResponse(toUploadAnalysisBody(result)));
        })
    ];

    /**
     * JSON body with already extracted text: `resumeText`, `jobDescription`
     * and optional `sections`.
     */
    const analyzeText: RequestHandler[] = [
        validateRequest({
            body: {
                resumeText: { type: 'string', required: true },
                jobDescription: { type: 'string', required: true },
                sections: { type: 'object', required: false }
            }
        }),

        asyncHandler(async (req: Request, res: Response) => {
            const resumeText = String(req.body.resumeText);
            const analysis = await service.analyze({
                resumeText,
                parsedDocument: documentFromBody(resumeText, req.body.sections),
                jobDescription: String(req.body.jobDescription)
            });

            res.json(createSuccessResponse(toAnalysisBody(analysis)));
        })
    ];

    return { analyzeUpload, analyzeText };
}

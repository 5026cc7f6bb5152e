import { describe, expect, it } from 'vitest';
import { CompromiseNlpModel, TaggedToken, groupEntities, labelProducts, loadNlpModel } from '../services/nlpModel';
import { ConfigurationError } from '../utils/errors';

const token = (text: string, label: TaggedToken['label'] = null, closes = false): TaggedToken => ({
    text,
    normal: text.toLowerCase(),
    label,
    closes
});

describe('groupEntities', () => {
    it('joins consecutive tokens with the same label', () => {
        const tokens = [
            token('Acme', 'ORG'),
            token('Corp', 'ORG', true),
            token('hired'),
            token('Jane', 'PERSON'),
            token('Doe', 'PERSON')
        ];

        expect(groupEntities(tokens)).toEqual([
            { text: 'Acme Corp', label: 'ORG' },
            { text: 'Jane Doe', label: 'PERSON' }
        ]);
    });

    it('ends an entity at closing punctuation', () => {
        expect(groupEntities([token('Google', 'ORG', true), token('Microsoft', 'ORG')])).toEqual([
            { text: 'Google', label: 'ORG' },
            { text: 'Microsoft', label: 'ORG' }
        ]);
    });

    it('splits when the label changes', () => {
        expect(groupEntities([token('German', 'NORP'), token('Berlin', 'GPE')])).toEqual([
            { text: 'German', label: 'NORP' },
            { text: 'Berlin', label: 'GPE' }
        ]);
    });
});

describe('labelProducts', () => {
    it('prefers the longest lexicon phrase', () => {
        const products = new Set(['spring boot', 'docker']);
        const tokens = [token('Use'), token('Spring', 'PERSON'), token('Boot'), token('and'), token('Docker')];

        expect(groupEntities(labelProducts(tokens, products))).toEqual([
            { text: 'Spring Boot', label: 'PRODUCT' },
            { text: 'Docker', label: 'PRODUCT' }
        ]);
    });

    it('leaves the input tokens untouched', () => {
        const tokens = [token('Docker')];
        labelProducts(tokens, new Set(['docker']));

        expect(tokens[0].label).toBeNull();
    });
});

describe('CompromiseNlpModel', () => {
    it('recognizes technologies from the lexicon', () => {
        const entities = new CompromiseNlpModel().entities('We use Docker and Kubernetes.');

        expect(entities).toContainEqual({ text: 'Docker', label: 'PRODUCT' });
        expect(entities).toContainEqual({ text: 'Kubernetes', label: 'PRODUCT' });
    });
});

describe('loadNlpModel', () => {
    it('loads the compromise model', () => {
        expect(loadNlpModel('compromise').name).toBe('compromise');
    });

    it('rejects an unknown model', () => {
        expect(() => loadNlpModel('en_core_web_sm')).toThrow(ConfigurationError);
    });
});

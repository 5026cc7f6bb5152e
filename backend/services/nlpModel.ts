import nlp from 'compromise';
import productLexicon from '../data/productLexicon.json';
import { ConfigurationError, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

export type EntityLabel = 'ORG' | 'PRODUCT' | 'GPE' | 'PERSON' | 'NORP';

export interface Entity {
    text: string;
    label: EntityLabel;
}

/**
 * Read-only entity recognizer shared by every analysis in the process.
 */
export interface NlpModel {
    readonly name: string;
    entities(text: string): Entity[];
}

export interface TaggedToken {
    text: string;
    normal: string;
    label: EntityLabel | null;
    // Token is followed by punctuation that closes a span
    closes: boolean;
}

// First matching tag wins
const TAG_LABELS: ReadonlyArray<[string, EntityLabel]> = [
    ['Organization', 'ORG'],
    ['Person', 'PERSON'],
    ['Place', 'GPE'],
    ['Demonym', 'NORP']
];

const CLOSING_PUNCTUATION = /[.,;:!?()[\]]/;

// Longest product phrase, in tokens
const MAX_PRODUCT_WORDS = 3;

interface JsonTerm {
    text: string;
    normal: string;
    tags: string[];
    post: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null;
}

function readTerm(value: unknown): JsonTerm | null {
    if (!isRecord(value) || typeof value.text !== 'string') {
        return null;
    }
    const tags = Array.isArray(value.tags)
        ? value.tags.filter((tag): tag is string => typeof tag === 'string')
        : [];
    return {
        text: value.text,
        normal: typeof value.normal === 'string' ? value.normal : value.text.toLowerCase(),
        tags,
        post: typeof value.post === 'string' ? value.post : ''
    };
}

function readTerms(json: unknown): JsonTerm[] {
    const terms: JsonTerm[] = [];
    if (!Array.isArray(json)) {
        return terms;
    }
    for (const sentence of json) {
        if (!isRecord(sentence) || !Array.isArray(sentence.terms)) {
            continue;
        }
        for (const raw of sentence.terms) {
            const term = readTerm(raw);
            if (term) {
                terms.push(term);
            }
        }
    }
    return terms;
}

/**
 * Joins runs of tokens sharing a label into entities. Punctuation after a
 * token ends the run.
 */
export function groupEntities(tokens: readonly TaggedToken[]): Entity[] {
    const entities: Entity[] = [];
    let words: string[] = [];
    let label: EntityLabel | null = null;

    const close = () => {
        if (label && words.length > 0) {
            entities.push({ text: words.join(' '), label });
        }
        words = [];
        label = null;
    };

    for (const token of tokens) {
        if (token.label !== label) {
            close();
        }
        if (token.label) {
            label = token.label;
            words.push(token.text);
        }
        if (token.closes) {
            close();
        }
    }
    close();

    return entities;
}

/**
 * Marks product names from the technology lexicon, preferring the longest
 * phrase at each position. Product labels override the tagger's.
 */
export function labelProducts(tokens: TaggedToken[], products: ReadonlySet<string>): TaggedToken[] {
    const result = tokens.map((token) => ({ ...token }));
    let i = 0;

    while (i < result.length) {
        let matched = 0;
        for (let size = Math.min(MAX_PRODUCT_WORDS, result.length - i); size > 0; size--) {
            const window = result.slice(i, i + size);
            // A phrase cannot span closing punctuation
            if (window.slice(0, -1).some((token) => token.closes)) {
                continue;
            }
            if (products.has(window.map((token) => token.normal).join(' '))) {
                matched = size;
                break;
            }
        }

        if (matched === 0) {
            i++;
            continue;
        }
        for (let j = i; j < i + matched; j++) {
            result[j].label = 'PRODUCT';
        }
        // Keep adjacent products apart
        result[i + matched - 1].closes = true;
        i += matched;
    }

    return result;
}

export class CompromiseNlpModel implements NlpModel {
    readonly name = 'compromise';
    private readonly products: ReadonlySet<string>;

    constructor(products: readonly string[] = productLexicon) {
        this.products = new Set(products.map((product) => product.toLowerCase()));
    }

    entities(text: string): Entity[] {
        const json: unknown = nlp(text).json();
        const tokens = readTerms(json).map((term): TaggedToken => {
            const match = TAG_LABELS.find(([tag]) => term.tags.includes(tag));
            return {
                text: term.text,
                normal: term.normal,
                label: match ? match[1] : null,
                closes: CLOSING_PUNCTUATION.test(term.post)
            };
        });

        return groupEntities(labelProducts(tokens, this.products)).filter((entity) => entity.text.length > 0);
    }
}

/**
 * Builds the process-wide model once at start-up.
 * @throws ConfigurationError when the model is unknown or cannot be loaded
 */
export function loadNlpModel(name: string): NlpModel {
    if (name !== 'compromise') {
        throw new ConfigurationError(`Unknown NLP model: ${name}`, { supported: ['compromise'] });
    }

    try {
        const model = new CompromiseNlpModel();
        // Fail at start-up on a broken install
        model.entities('Warm up.');
        logger.info('NLP model loaded', { model: model.name });
        return model;
    } catch (error) {
        logger.error('NLP model failed to load', { model: name, error: errorMessage(error) });
        throw new ConfigurationError(`NLP model ${name} could not be loaded: ${errorMessage(error)}`);
    }
}

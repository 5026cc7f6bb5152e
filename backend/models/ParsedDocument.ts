// Document type hint supplied with uploaded bytes
export type DeclaredType = 'pdf' | 'docx';

export const SECTION_KEYS = ['experience', 'education', 'skills'] as const;

export type SectionKey = typeof SECTION_KEYS[number];

export type Sections = Readonly<Record<SectionKey, readonly string[]>>;

// Contact fields, each the first match found in the text
export interface ContactInfo {
    email?: string;
    phone?: string;
    linkedin?: string;
}

export interface ParsedDocument {
    readonly rawText: string;
    readonly contact: Readonly<ContactInfo>;
    readonly sections: Sections;
}

export function emptySections(): Record<SectionKey, string[]> {
    return { experience: [], education: [], skills: [] };
}

/**
 * Document kinds recognised by the classifier.
 */
export type DocumentType = 'conversation' | 'markdown' | 'plain_text' | 'structured' | 'random';

/** Numeric or boolean document features; other values are ignored downstream */
export type FeatureValue = number | boolean | string;

/**
 * Classifier output consumed by the triple builder.
 */
export interface DocumentMetadata {
    type: DocumentType;
    confidence: number;
    features: Record<string, FeatureValue>;
    title?: string;
}

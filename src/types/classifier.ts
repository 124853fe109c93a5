import type { Annotations } from './record.js';

/**
 * Classifier capability. Raises ClassificationError on failure;
 * callers treat failures as "leave the annotation fields unset".
 */
export interface Classifier {
    classify(title: string, abstract: string | null): Promise<Annotations>;
}

/**
 * Function words ignored when comparing titles by word overlap.
 * Deliberately small: content words such as "model" or "learning" must count.
 */
export const TITLE_STOPWORDS: ReadonlySet<string> = new Set([
    'the', 'a', 'an', 'of', 'in', 'on', 'at', 'to', 'for', 'and', 'or', 'with',
]);

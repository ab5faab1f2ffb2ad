const STOP_WORDS = new Set([
    'a', 'an', 'and', 'are', 'as', 'at', 'be', 'by', 'can', 'do', 'does', 'for', 'from', 'how', 'in',
    'is', 'it', 'of', 'on', 'or', 'that', 'the', 'this', 'to', 'was', 'what', 'when', 'which', 'with',
    'would', 'you', 'your'
]);

export function tokenize(text: string): Set<string> {
    const tokens = text
        .toLowerCase()
        .split(/[^a-z0-9]+/)
        .filter(token => token.length > 0 && !STOP_WORDS.has(token));
    return new Set(tokens);
}

/**
 * Jaccard similarity of the content-word sets of two texts, in [0, 1].
 */
export function jaccardSimilarity(a: string, b: string): number {
    const left = tokenize(a);
    const right = tokenize(b);
    if (left.size === 0 && right.size === 0) {
        return 1;
    }
    let intersection = 0;
    for (const token of left) {
        if (right.has(token)) {
            intersection++;
        }
    }
    return intersection / (left.size + right.size - intersection);
}

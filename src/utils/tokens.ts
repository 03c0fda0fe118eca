/** Rough token count: about four UTF-8 bytes per token, never less than one. */
export function estimateTokens(text: string): number {
    return Math.max(1, Math.floor(Buffer.byteLength(text, 'utf8') / 4));
}

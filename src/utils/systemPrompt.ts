/** Fills the `{{max_tokens}}` placeholder of the system prompt template. */
export function renderSystemPrompt(template: string, maxTokens: number): string {
    return template.replace(/\{\{\s*max_tokens\s*\}\}/g, String(maxTokens));
}

// Centralized request construction for provider-agnostic use

export const JSON_ONLY_DIRECTIVE =
  'IMPORTANT: Return ONLY valid JSON, no other text or markdown formatting.';

export interface RequestBuilder {
  buildPromptBodyForStructured(originalBody: string): string;
}

export class DefaultRequestBuilder implements RequestBuilder {
  private directive: string;

  constructor(directive: string = JSON_ONLY_DIRECTIVE) {
    this.directive = directive.trim();
  }

  buildPromptBodyForStructured(originalBody: string): string {
    const directive = this.directive ? `\n\n${this.directive}` : '';
    return originalBody + directive;
  }
}

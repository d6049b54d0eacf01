// Centralized prompt construction for provider-agnostic use

export interface RequestBuilder {
  buildPrompt(prompt: string): string;
}

export class DefaultRequestBuilder implements RequestBuilder {
  private directive: string;

  constructor(directive?: string) {
    this.directive = (directive || '').trim();
  }

  buildPrompt(prompt: string): string {
    const directive = this.directive ? `\n\n${this.directive}` : '';
    return prompt + directive;
  }
}

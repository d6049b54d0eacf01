import type { GenerateOptions, LLMProvider, LLMResult } from '../src/providers/llm-provider';
import type { PromptTemplateProvider } from '../src/prompts/prompt-loader';

/**
 * Resolves after `ms`, or rejects with the signal's reason once it aborts.
 */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
        if (signal?.aborted) {
            reject(signal.reason);
            return;
        }
        const onAbort = (): void => {
            clearTimeout(timer);
            reject(signal?.reason);
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);
        signal?.addEventListener('abort', onAbort, { once: true });
    });
}

export type Responder = (prompt: string, signal: AbortSignal | undefined) => Promise<LLMResult> | LLMResult;

/**
 * In-process backend that records every prompt and answers through `respond`.
 */
export class FakeProvider implements LLMProvider {
    readonly prompts: string[] = [];
    readonly signals: Array<AbortSignal | undefined> = [];

    constructor(
        private readonly respond: Responder,
        readonly name: string = 'fake'
    ) {}

    get calls(): number {
        return this.prompts.length;
    }

    async generate(prompt: string, options: GenerateOptions = {}): Promise<LLMResult> {
        this.prompts.push(prompt);
        this.signals.push(options.signal);
        return this.respond(prompt, options.signal);
    }
}

/**
 * Never settles unless its signal aborts.
 */
export function hangingResponder(): Responder {
    return (_prompt, signal) =>
        new Promise<LLMResult>((_, reject) => {
            signal?.addEventListener('abort', () => reject(signal.reason), { once: true });
        });
}

export class StaticPrompts implements PromptTemplateProvider {
    readonly requested: string[] = [];

    constructor(private readonly templates: Record<string, string>) {}

    loadTemplate(name: string): Promise<string> {
        this.requested.push(name);
        const template = this.templates[name];
        if (template === undefined) {
            return Promise.reject(new Error(`No template named ${name}`));
        }
        return Promise.resolve(template);
    }
}

/**
 * `count` paragraphs of repeated prose joined by blank lines. Each paragraph
 * estimates at 150 tokens.
 */
export function paragraphs(count: number): string {
    return Array.from({ length: count }, (_, i) =>
        `Paragraph ${i + 1} repeats filler prose so the document grows past the chunk budget. `.repeat(10).trim()
    ).join('\n\n');
}

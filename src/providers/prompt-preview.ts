import { debug } from '../output/logger';
import { handleUnknownError } from '../errors/index';

export interface DebugOptions {
  debug?: boolean | undefined;
  showPrompt?: boolean | undefined; // full prompt
  showPromptTrunc?: boolean | undefined; // truncated preview
  debugJson?: boolean | undefined;
}

const PREVIEW_LENGTH = 500;

export function logRequest(provider: string, meta: Record<string, unknown>, prompt: string, opts: DebugOptions): void {
  if (!opts.debug) return;

  debug(`Sending request to ${provider}:`, meta);
  if (opts.showPrompt) {
    debug('Prompt (full):');
    debug(prompt);
  } else if (opts.showPromptTrunc) {
    debug(`Prompt (first ${PREVIEW_LENGTH} chars):`);
    debug(prompt.slice(0, PREVIEW_LENGTH));
    if (prompt.length > PREVIEW_LENGTH) debug('... [truncated]');
  }
}

export function logResponse(meta: Record<string, unknown>, raw: unknown, opts: DebugOptions): void {
  if (!opts.debug) return;

  debug('LLM response meta:', meta);
  if (opts.debugJson) {
    try {
      debug('Full JSON response:');
      debug(JSON.stringify(raw, null, 2));
    } catch (e: unknown) {
      const err = handleUnknownError(e, 'JSON stringify for debug');
      debug(`Warning: ${err.message}`);
    }
  }
}

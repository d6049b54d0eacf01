import { readFile } from 'fs/promises';
import path from 'path';
import { getDefaultTemplate, hasDefaultTemplate } from './default-templates';
import { ValidationError, handleUnknownError } from '../errors/index';
import { debug, warn } from '../output/logger';

/**
 * Source of prompt templates by name.
 */
export interface PromptTemplateProvider {
  loadTemplate(name: string): Promise<string>;
}

function isMissingFile(e: unknown): boolean {
  return e instanceof Error && 'code' in e && (e.code === 'ENOENT' || e.code === 'ENOTDIR');
}

/**
 * Reads `<dir>/<name>.md`, falling back to the built-in template when the
 * directory is unset or the file is missing or unreadable.
 */
export class FilePromptLoader implements PromptTemplateProvider {
  private readonly cache = new Map<string, string>();

  constructor(private readonly promptsDir?: string) {}

  async loadTemplate(name: string): Promise<string> {
    if (!name || name !== path.basename(name)) {
      throw new ValidationError(`Invalid prompt name '${name}': expected a bare name without directories`);
    }

    const cached = this.cache.get(name);
    if (cached !== undefined) return cached;

    const template = await this.readTemplate(name);
    this.cache.set(name, template);
    return template;
  }

  private async readTemplate(name: string): Promise<string> {
    if (!this.promptsDir) {
      return this.fallback(name);
    }

    const templatePath = path.join(this.promptsDir, `${name}.md`);
    try {
      const content = await readFile(templatePath, 'utf-8');
      debug(`Loaded template '${name}' from ${templatePath}`);
      return content;
    } catch (e: unknown) {
      if (isMissingFile(e)) {
        debug(`No template file at ${templatePath}`);
      } else {
        const err = handleUnknownError(e, `Reading template ${templatePath}`);
        warn(`Could not read prompt template ${templatePath}: ${err.message}. Using built-in default.`);
      }
      return this.fallback(name);
    }
  }

  private fallback(name: string): string {
    if (!hasDefaultTemplate(name)) {
      warn(`Unknown prompt template '${name}', using the default final summary prompt`);
    }
    return getDefaultTemplate(name);
  }
}

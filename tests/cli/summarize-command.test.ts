import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Command } from 'commander';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { registerSummarizeCommand } from '../../src/cli/commands';
import { setSilentMode, setVerboseMode } from '../../src/output/logger';

class ProcessExit extends Error {
    constructor(readonly code: string | number | null | undefined) {
        super(`process.exit(${String(code)})`);
    }
}

describe('summarize command', () => {
    let program: Command;
    let tmpDir: string;

    beforeEach(() => {
        program = new Command();
        program.exitOverride();
        registerSummarizeCommand(program);
        tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'chunkwise-cli-'));
        vi.stubEnv('LLM_PROVIDER', '');
        vi.spyOn(process, 'exit').mockImplementation((code) => {
            throw new ProcessExit(code);
        });
    });

    afterEach(() => {
        fs.rmSync(tmpDir, { recursive: true, force: true });
        vi.unstubAllEnvs();
        vi.restoreAllMocks();
        setSilentMode(false);
        setVerboseMode(false);
    });

    const writeInput = (content: string): string => {
        const file = path.join(tmpDir, 'lecture.txt');
        fs.writeFileSync(file, content);
        return file;
    };

    it('should register summarize command', () => {
        const command = program.commands.find(c => c.name() === 'summarize');
        expect(command).toBeDefined();
        expect(command?.description()).toContain('Summarize an extracted text file');
    });

    it('should have correct options', () => {
        const command = program.commands.find(c => c.name() === 'summarize');
        const options = command?.options.map(o => o.name());

        expect(options).toEqual(expect.arrayContaining([
            'prompt',
            'chunk-prompt',
            'prompts-dir',
            'var',
            'chunk-size',
            'chunk-overlap',
            'concurrency',
            'timeout',
            'max-reduce-rounds',
            'preset',
            'directive',
            'output',
            'verbose',
        ]));
    });

    it('prints a JSON summary with the simulated backend', async () => {
        const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
        const file = writeInput('A short note about loops.');

        await expect(program.parseAsync(['summarize', file, '--output', 'json'], { from: 'user' })).rejects.toThrow(
            new ProcessExit(0)
        );

        expect(logSpy).toHaveBeenCalledTimes(1);
        const printed = logSpy.mock.calls[0]?.[0];
        expect(typeof printed).toBe('string');
        const json: unknown = JSON.parse(String(printed));
        expect(json).toMatchObject({
            summary: '[Simulated AI summary]',
            path: 'simulated',
            chunks: 1,
            calls: 1,
            metadata: { provider: 'simulated' },
        });
    });

    it('prints the plain summary in text mode and warns about the simulated backend', async () => {
        const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
        const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
        const file = writeInput('A short note about loops.');

        await expect(program.parseAsync(['summarize', file], { from: 'user' })).rejects.toThrow(new ProcessExit(0));

        expect(logSpy).toHaveBeenCalledWith('[Simulated AI summary]');
        expect(warnSpy).toHaveBeenCalledWith('[chunkwise]', 'No LLM_PROVIDER configured; running with the simulated backend');
    });

    it('exits with 1 when the input file cannot be read', async () => {
        vi.spyOn(console, 'warn').mockImplementation(() => {});
        const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
        const missing = path.join(tmpDir, 'missing.txt');

        await expect(program.parseAsync(['summarize', missing], { from: 'user' })).rejects.toThrow(new ProcessExit(1));

        expect(errorSpy).toHaveBeenCalledWith(
            expect.stringContaining(`Summarization failed: Cannot read input file ${missing}`)
        );
    });

    it('exits with 1 on invalid options', async () => {
        const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
        const file = writeInput('A short note about loops.');

        await expect(
            program.parseAsync(['summarize', file, '--var', 'novalue'], { from: 'user' })
        ).rejects.toThrow(new ProcessExit(1));

        expect(errorSpy).toHaveBeenCalledWith("Error: Invalid --var 'novalue': expected key=value");
    });

    it('exits with 1 when the provider is misconfigured', async () => {
        vi.stubEnv('LLM_PROVIDER', 'openai');
        vi.stubEnv('OPENAI_API_KEY', '');
        const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
        const file = writeInput('A short note about loops.');

        await expect(program.parseAsync(['summarize', file], { from: 'user' })).rejects.toThrow(new ProcessExit(1));

        expect(errorSpy).toHaveBeenCalledWith('Please set these in your .env file or environment.');
    });
});

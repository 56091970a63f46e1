import { execa } from 'execa';
import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { Terminal } from './terminal.js';

/**
 * Opens text in an external editor and returns what the user saved.
 */
export interface Editor {
    edit(initialContent: string): Promise<string>;
}

export class EditorError extends Error {
    constructor(message: string, public cause?: unknown) {
        super(message);
        this.name = 'EditorError';
    }
}

/**
 * Runs `$VISUAL`/`$EDITOR` on a temp file. The terminal, when given, is
 * suspended while the editor has the screen.
 */
export class ExternalEditor implements Editor {
    constructor(
        private readonly terminal?: Pick<Terminal, 'suspend' | 'resume'>,
        private readonly command = process.env.VISUAL || process.env.EDITOR || 'vi'
    ) {}

    async edit(initialContent: string): Promise<string> {
        const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'ticketwright-'));
        const file = path.join(dir, 'edit.md');

        try {
            await fs.writeFile(file, initialContent, 'utf8');

            // EDITOR may carry flags, e.g. "code --wait"
            const [bin, ...args] = this.command.trim().split(/\s+/);
            this.terminal?.suspend();
            try {
                await execa(bin, [...args, file], { stdio: 'inherit' });
            } catch (error) {
                const message = error instanceof Error ? error.message : String(error);
                throw new EditorError(`Editor "${this.command}" exited with an error: ${message}`, error);
            } finally {
                this.terminal?.resume();
            }

            const edited = await fs.readFile(file, 'utf8');
            return edited.trim();
        } finally {
            await fs.rm(dir, { recursive: true, force: true });
        }
    }
}

import { createInterface, Interface } from 'node:readline/promises';
import { stdin as input, stdout as output } from 'node:process';

/**
 * Line-oriented terminal I/O. Every prompt and message of a command goes
 * through here so commands can run against a scripted terminal.
 */
export interface Terminal {
    /** Show `prompt` and read one line, without its newline. */
    ask(prompt: string): Promise<string>;
    print(text?: string): void;
    /** Let go of the terminal while another program owns it. */
    suspend(): void;
    /** Take the terminal back after `suspend`. */
    resume(): void;
    close(): void;
}

export class ReadlineTerminal implements Terminal {
    private rl: Interface | undefined;

    async ask(prompt: string): Promise<string> {
        return this.open().question(prompt);
    }

    print(text = ''): void {
        console.log(text);
    }

    suspend(): void {
        this.rl?.close();
        this.rl = undefined;
    }

    resume(): void {
        this.open();
    }

    close(): void {
        this.suspend();
    }

    private open(): Interface {
        if (!this.rl) {
            this.rl = createInterface({ input, output });
        }
        return this.rl;
    }
}

import { promises as fs } from 'node:fs';
import path from 'node:path';
import YAML from 'yaml';
import { z } from 'zod';

export const MAX_RECENT = 6;

const StateFileSchema = z.object({
    recent_parent_tickets: z.array(z.string()).default([]),
}).passthrough();

export type StateFile = z.infer<typeof StateFileSchema>;

export class StateError extends Error {
    constructor(message: string, public cause?: unknown) {
        super(message);
        this.name = 'StateError';
    }
}

/**
 * Move `item` to the end of `list`, keeping the last `maxSize` unique entries.
 */
export function addToRecentList(list: readonly string[], item: string, maxSize = MAX_RECENT): string[] {
    const result = list.filter(existing => existing !== item);
    result.push(item);
    return result.slice(-maxSize);
}

function pad(value: number): string {
    return String(value).padStart(2, '0');
}

/** `YYYYMMDD-HHMMSS` in local time. */
export function fileTimestamp(date: Date): string {
    return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}-` +
        `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
}

function displayTimestamp(date: Date): string {
    return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
        `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

/**
 * Small per-user state kept next to config.yaml. Writes replace the whole
 * file; concurrent runs are not coordinated.
 */
export class StateStore {
    constructor(private readonly configDir: string) {}

    get statePath(): string {
        return path.join(this.configDir, 'state.yaml');
    }

    async load(): Promise<StateFile> {
        let raw: string;
        try {
            raw = await fs.readFile(this.statePath, 'utf8');
        } catch (error: unknown) {
            if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
                return { recent_parent_tickets: [] };
            }
            throw new StateError(`Failed to read ${this.statePath}`, error);
        }

        let parsed: unknown;
        try {
            parsed = YAML.parse(raw) ?? {};
        } catch (error: unknown) {
            throw new StateError(`${this.statePath} is not valid YAML`, error);
        }
        const result = StateFileSchema.safeParse(parsed);
        if (!result.success) {
            throw new StateError(`Invalid state file ${this.statePath}: ${result.error.message}`, result.error);
        }
        return result.data;
    }

    async save(state: StateFile): Promise<void> {
        await fs.mkdir(this.configDir, { recursive: true });
        await fs.writeFile(this.statePath, YAML.stringify(state), { encoding: 'utf8', mode: 0o600 });
    }

    async recentParents(): Promise<string[]> {
        return (await this.load()).recent_parent_tickets;
    }

    async addRecentParent(key: string): Promise<void> {
        const state = await this.load();
        await this.save({ ...state, recent_parent_tickets: addToRecentList(state.recent_parent_tickets, key) });
    }

    /**
     * Keep a rejected decomposition plan for later reference. Returns the file path.
     */
    async saveRejectedPlan(parentKey: string, planText: string, now = new Date()): Promise<string> {
        const dir = path.join(this.configDir, 'decompose-rejections');
        await fs.mkdir(dir, { recursive: true });

        const file = path.join(dir, `${parentKey}-${fileTimestamp(now)}.md`);
        const content = '# Rejected Decomposition Plan\n\n' +
            `Parent Ticket: ${parentKey}\n` +
            `Rejected: ${displayTimestamp(now)}\n\n` +
            planText;
        await fs.writeFile(file, content, { encoding: 'utf8', mode: 0o600 });
        return file;
    }
}

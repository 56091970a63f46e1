import { promises as fs } from 'node:fs';
import path from 'node:path';
import { describe, it, expect } from 'vitest';
import { addToRecentList, fileTimestamp, StateError, StateStore } from '../../src/state/store.js';
import { tempDir } from '../helpers/fakes.js';

describe('addToRecentList', () => {
    it('appends new items', () => {
        expect(addToRecentList(['A-1'], 'A-2')).toEqual(['A-1', 'A-2']);
    });

    it('moves an existing item to the end', () => {
        expect(addToRecentList(['A-1', 'A-2', 'A-3'], 'A-1')).toEqual(['A-2', 'A-3', 'A-1']);
    });

    it('drops the oldest beyond the limit', () => {
        expect(addToRecentList(['A-1', 'A-2', 'A-3'], 'A-4', 3)).toEqual(['A-2', 'A-3', 'A-4']);
    });
});

describe('StateStore', () => {
    it('starts empty when there is no state file', async () => {
        const store = new StateStore(tempDir());
        expect(await store.load()).toEqual({ recent_parent_tickets: [] });
    });

    it('remembers the six most recent parents and keeps other keys', async () => {
        const dir = tempDir();
        await fs.writeFile(path.join(dir, 'state.yaml'), 'recent_parent_tickets: [ENG-1]\nnote: kept\n');
        const store = new StateStore(dir);

        for (const key of ['ENG-2', 'ENG-3', 'ENG-4', 'ENG-5', 'ENG-6', 'ENG-7', 'ENG-2']) {
            await store.addRecentParent(key);
        }

        expect(await store.recentParents()).toEqual(['ENG-3', 'ENG-4', 'ENG-5', 'ENG-6', 'ENG-7', 'ENG-2']);
        expect((await store.load()).note).toBe('kept');
    });

    it('rejects a malformed state file', async () => {
        const dir = tempDir();
        await fs.writeFile(path.join(dir, 'state.yaml'), 'recent_parent_tickets: 12\n');

        await expect(new StateStore(dir).load()).rejects.toBeInstanceOf(StateError);
    });

    it('saves rejected plans with a timestamped name', async () => {
        const dir = tempDir();
        const when = new Date(2024, 2, 5, 9, 7, 3);

        const file = await new StateStore(dir).saveRejectedPlan('ENG-1', '# DECOMPOSITION PLAN\n', when);

        expect(fileTimestamp(when)).toBe('20240305-090703');
        expect(file).toBe(path.join(dir, 'decompose-rejections', 'ENG-1-20240305-090703.md'));
        expect(await fs.readFile(file, 'utf8')).toBe(
            '# Rejected Decomposition Plan\n\nParent Ticket: ENG-1\nRejected: 2024-03-05 09:07:03\n\n# DECOMPOSITION PLAN\n'
        );
    });
});

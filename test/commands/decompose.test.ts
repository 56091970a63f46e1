import { promises as fs } from 'node:fs';
import { describe, it, expect } from 'vitest';
import { formatExistingChildren, runDecompose } from '../../src/commands/decompose.js';
import {
    FakeEditor,
    FakeGenerationClient,
    InMemoryTicketClient,
    makeConfig,
    makeDeps,
    makeTicket,
    ScriptedTerminal,
} from '../helpers/fakes.js';

function checkoutTracker(): InMemoryTicketClient {
    return new InMemoryTicketClient([
        makeTicket({ key: 'ENG-10', summary: 'Checkout flow', description: 'Pay for the cart', issueType: 'Story' }),
    ]);
}

describe('formatExistingChildren', () => {
    it('lists children with their keys', () => {
        expect(formatExistingChildren([
            { key: 'ENG-2', summary: 'Cart API', storyPoints: 1, type: 'Task' },
            { key: 'ENG-3', summary: 'Refunds', storyPoints: 5, type: 'Story' },
        ])).toBe('- Cart API (1 point) - Task [EXISTING] ENG-2\n- Refunds (5 points) - Story [EXISTING] ENG-3');
        expect(formatExistingChildren([])).toBe('None');
    });
});

describe('runDecompose', () => {
    it('creates the accepted plan and rolls points up to the parent', async () => {
        const tracker = checkoutTracker();
        tracker.searchResults.set('parent = ENG-10', [
            makeTicket({ key: 'ENG-11', summary: 'Cart API', storyPoints: 3, issueType: 'Task' }),
        ]);
        const generation = new FakeGenerationClient({
            content: [[
                '# DECOMPOSITION PLAN',
                '',
                '## NEW TICKETS',
                '- [ ] Payment form (3 points)',
                '- [ ] cart api (2 points)',
                '- [ ] Receipt email (1 point)',
            ].join('\n')],
        });
        const terminal = new ScriptedTerminal(['', '']);
        const deps = makeDeps({ tracker, generation, terminal });

        const result = await runDecompose(deps, 'ENG-10', { maxPoints: 5 });

        expect(result).toEqual({ created: ['ENG-100', 'ENG-101'], totalPoints: 7 });
        expect(generation.contentPrompts).toEqual([
            'DECOMPOSE Checkout flow | Pay for the cart | Task | 5\n- Cart API (3 points) - Task [EXISTING] ENG-11',
        ]);
        expect(terminal.output).toContain('  ⚠  Skipping "cart api" - already exists as ENG-11');

        const start = terminal.output.indexOf('\n▸ Decomposition plan for ENG-10');
        expect(terminal.output.slice(start, start + 12)).toEqual([
            '\n▸ Decomposition plan for ENG-10',
            'NEW TICKETS:',
            '[1] Payment form (3 points) - Task',
            '[2] Receipt email (1 point) - Task',
            '',
            'EXISTING TICKETS:',
            '[x] Cart API (3 points) [EXISTING] ENG-11',
            '',
            'Summary:',
            '- New tickets: 2 (4 total story points)',
            '- Existing tickets: 1 (3 total story points)',
            '- Total: 3 tickets (7 total story points)',
        ]);
        expect(terminal.prompts).toEqual([
            'Create these 2 tickets? [Y/n/e(dit)/s(how)] ',
            'Create these tickets? [Y/n] ',
        ]);

        expect(tracker.created).toEqual([
            { project: 'ENG', issueType: 'Task', summary: 'Payment form', parentKey: 'ENG-10' },
            { project: 'ENG', issueType: 'Task', summary: 'Receipt email', parentKey: 'ENG-10' },
        ]);
        expect(tracker.pointUpdates).toEqual([
            { key: 'ENG-100', points: 3 },
            { key: 'ENG-101', points: 1 },
            { key: 'ENG-10', points: 7 },
        ]);
        expect(terminal.output[terminal.output.length - 1]).toBe('  ✓  Updated parent ENG-10 story points to 7 (was 0)');
    });

    it('saves a rejected plan', async () => {
        const generation = new FakeGenerationClient({ content: ['## NEW TICKETS\n- [ ] Payment form (3 points)'] });
        const terminal = new ScriptedTerminal(['n']);
        const deps = makeDeps({ tracker: checkoutTracker(), generation, terminal });

        expect(await runDecompose(deps, 'ENG-10', { maxPoints: 5 })).toBeUndefined();

        const saved = deps.logger.entries.find(entry => entry.message === 'Rejected plan saved');
        const content = await fs.readFile(String(saved?.fields.path), 'utf8');
        expect(content.startsWith('# Rejected Decomposition Plan\n\nParent Ticket: ENG-10\nRejected: ')).toBe(true);
        expect(content.endsWith('\n\n# DECOMPOSITION PLAN\n\n## NEW TICKETS\n- [ ] Payment form (3 points)\n')).toBe(true);
        expect(terminal.output[terminal.output.length - 1]).toBe('  ℹ  Decomposition canceled.');
        expect(deps.tracker.created).toEqual([]);
    });

    it('refuses an oversized plan until it is edited', async () => {
        const generation = new FakeGenerationClient({ content: ['## NEW TICKETS\n- [ ] Big thing (8 points)'] });
        const editor = new FakeEditor(['## NEW TICKETS\n- [ ] Small thing (2 points)\n- [ ] Other thing (3 points)']);
        const terminal = new ScriptedTerminal(['y', 'e', '', 'n']);
        const deps = makeDeps({ tracker: checkoutTracker(), generation, editor, terminal });

        expect(await runDecompose(deps, 'ENG-10', { maxPoints: 5 })).toBeUndefined();

        expect(terminal.output).toContain(
            '  ✗  Plan is invalid ticket "Big thing" has 8 story points, exceeding the limit of 5'
        );
        expect(terminal.output).toContain('     Edit the plan to fix it, or reject it.');
        expect(editor.seen).toEqual(['# DECOMPOSITION PLAN\n\n## NEW TICKETS\n- [ ] Big thing (8 points)\n']);
        expect(terminal.prompts).toEqual([
            'Create these 1 tickets? [Y/n/e(dit)/s(how)] ',
            'Create these 1 tickets? [Y/n/e(dit)/s(how)] ',
            'Create these 2 tickets? [Y/n/e(dit)/s(how)] ',
            'Create these tickets? [Y/n] ',
        ]);
        expect(terminal.output[terminal.output.length - 1]).toBe('  ℹ  Canceled.');
        expect(deps.tracker.created).toEqual([]);
    });

    it('links children to an epic and keeps going past a failed create', async () => {
        const tracker = new InMemoryTicketClient([makeTicket({ key: 'ENG-20', issueType: 'Epic', storyPoints: 5 })]);
        tracker.failingSummaries.add('Beta');
        const generation = new FakeGenerationClient({
            content: ['## NEW TICKETS\n- [ ] Alpha (2 points)\n- [ ] Beta (3 points)'],
        });
        const config = makeConfig({ epicLinkFieldId: 'customfield_10014', defaultMaxDecomposePoints: 3 });
        const deps = makeDeps({ config, tracker, generation, terminal: new ScriptedTerminal(['', '']) });

        const result = await runDecompose(deps, 'ENG-20');

        expect(result).toEqual({ created: ['ENG-100'], totalPoints: 2 });
        expect(tracker.searches).toEqual(['parent = ENG-20', 'customfield_10014 = ENG-20']);
        expect(generation.contentPrompts[0]).toBe('DECOMPOSE Summary of ENG-20 | (no description) | Story | 3\nNone');
        expect(tracker.created).toEqual([{
            project: 'ENG',
            issueType: 'Story',
            summary: 'Alpha',
            epicLink: { fieldId: 'customfield_10014', epicKey: 'ENG-20' },
        }]);
        expect(deps.logger.entries).toContainEqual({
            level: 'warn',
            message: 'Failed to create ticket "Beta"',
            fields: { component: 'decompose', error: 'Issue tracker API error: cannot create "Beta"' },
        });
        expect(tracker.pointUpdates).toEqual([
            { key: 'ENG-100', points: 2 },
            { key: 'ENG-20', points: 2 },
        ]);
    });

    it('asks for the limit and child type when there is no default', async () => {
        const tracker = new InMemoryTicketClient([makeTicket({ key: 'ENG-30', issueType: 'Bug' })]);
        const generation = new FakeGenerationClient();
        const terminal = new ScriptedTerminal(['', 'story', '', 'n']);
        const deps = makeDeps({ tracker, generation, terminal });

        expect(await runDecompose(deps, '30')).toBeUndefined();

        expect(terminal.prompts).toEqual([
            'Maximum story points per child ticket [5]: ',
            'What type should child tickets be? [Task/Story/Sub-task/Other]: ',
            'Create these 0 tickets? [Y/n/e(dit)/s(how)] ',
            'Create these tickets? [Y/n] ',
        ]);
        expect(terminal.output).toContain('  ⚠  Parent ticket type "Bug" has no default child type mapping.');
        expect(generation.contentPrompts).toEqual(['DECOMPOSE Summary of ENG-30 | (no description) | Story | 5\nNone']);
    });
});

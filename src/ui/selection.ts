import { fmt } from '../core/console.js';
import { Terminal } from './terminal.js';

export type SelectionCommand =
    | { kind: 'toggle'; number: number }
    | { kind: 'mark-all' }
    | { kind: 'unmark-all' }
    | { kind: 'next' }
    | { kind: 'prev' }
    | { kind: 'act' }
    | { kind: 'quit' };

export interface SelectionState {
    readonly ids: readonly string[];
    readonly pageSize: number;
    /** Zero-based. */
    readonly page: number;
    readonly selected: ReadonlySet<string>;
}

export type SelectionOutcome = 'continue' | 'act' | 'quit';

export interface SelectionStep {
    state: SelectionState;
    outcome: SelectionOutcome;
    notice?: string;
}

export interface SelectionAction {
    /** Single-letter shortcut, e.g. `e`. Must not clash with m, u, n, p or q. */
    key: string;
    /** Verb shown in the menu and accepted as input, e.g. `estimate`. */
    label: string;
}

export type ParsedSelectionInput =
    | { ok: true; command: SelectionCommand }
    | { ok: false; error: string };

export function createSelectionState(ids: readonly string[], pageSize: number): SelectionState {
    return { ids, pageSize: Math.max(1, pageSize), page: 0, selected: new Set() };
}

export function pageCount(state: SelectionState): number {
    return Math.max(1, Math.ceil(state.ids.length / state.pageSize));
}

export function pageIds(state: SelectionState): readonly string[] {
    const start = state.page * state.pageSize;
    return state.ids.slice(start, start + state.pageSize);
}

/**
 * Apply one command. Pure: returns a new state and leaves the input untouched.
 * Toggle numbers are 1-based positions in the whole list; mark and unmark
 * apply to the current page.
 */
export function reduceSelection(state: SelectionState, command: SelectionCommand): SelectionStep {
    switch (command.kind) {
        case 'next':
            if (state.page >= pageCount(state) - 1) {
                return { state, outcome: 'continue', notice: 'Already on last page.' };
            }
            return { state: { ...state, page: state.page + 1 }, outcome: 'continue' };

        case 'prev':
            if (state.page === 0) {
                return { state, outcome: 'continue', notice: 'Already on first page.' };
            }
            return { state: { ...state, page: state.page - 1 }, outcome: 'continue' };

        case 'mark-all': {
            const onPage = pageIds(state);
            const selected = new Set(state.selected);
            onPage.forEach(id => selected.add(id));
            return {
                state: { ...state, selected },
                outcome: 'continue',
                notice: `Marked ${onPage.length} tickets on this page.`,
            };
        }

        case 'unmark-all': {
            const onPage = pageIds(state);
            const selected = new Set(state.selected);
            onPage.forEach(id => selected.delete(id));
            return {
                state: { ...state, selected },
                outcome: 'continue',
                notice: `Unmarked ${onPage.length} tickets on this page.`,
            };
        }

        case 'toggle': {
            if (!Number.isInteger(command.number) || command.number < 1 || command.number > state.ids.length) {
                return {
                    state,
                    outcome: 'continue',
                    notice: `Invalid ticket number. Please enter a number between 1 and ${state.ids.length}.`,
                };
            }
            const id = state.ids[command.number - 1];
            const selected = new Set(state.selected);
            const nowSelected = !selected.has(id);
            if (nowSelected) selected.add(id);
            else selected.delete(id);
            return {
                state: { ...state, selected },
                outcome: 'continue',
                notice: `${nowSelected ? 'Selected' : 'Deselected'} ${id}`,
            };
        }

        case 'act':
            if (state.selected.size === 0) {
                return { state, outcome: 'continue', notice: 'No tickets selected. Select tickets first.' };
            }
            return { state, outcome: 'act' };

        case 'quit':
            return { state, outcome: 'quit' };
    }
}

export function parseSelectionCommand(input: string, action: SelectionAction): ParsedSelectionInput {
    const text = input.trim().toLowerCase();

    if (text === 'n' || text === 'next') return { ok: true, command: { kind: 'next' } };
    if (text === 'p' || text === 'prev') return { ok: true, command: { kind: 'prev' } };
    if (text === 'q' || text === 'quit') return { ok: true, command: { kind: 'quit' } };
    if (text === 'm' || text === 'mark all') return { ok: true, command: { kind: 'mark-all' } };
    if (text === 'u' || text === 'unmark all') return { ok: true, command: { kind: 'unmark-all' } };
    if (text === action.key || text === action.label.toLowerCase()) return { ok: true, command: { kind: 'act' } };

    if (/^\d+$/.test(text)) {
        return { ok: true, command: { kind: 'toggle', number: Number.parseInt(text, 10) } };
    }

    return { ok: false, error: "Invalid input. Please enter a ticket number, action, or 'q' to quit." };
}

export function actionMenu(state: SelectionState, action: SelectionAction): string {
    const label = action.label.toLowerCase().startsWith(action.key)
        ? `[${action.key}]${action.label.slice(action.key.length)}`
        : `[${action.key}] ${action.label}`;
    return `Actions: [1-${state.ids.length}] toggle ticket | [m]ark all | [u]nmark all | ${label} selected | [n]ext | [p]rev | [q]uit`;
}

export interface SelectionLoopOptions<T> {
    idOf: (item: T) => string;
    /** One table row; `number` is the 1-based position in the whole list. */
    renderRow: (item: T, number: number, selected: boolean) => string;
    header?: string;
    pageSize: number;
    action: SelectionAction;
    /** Runs once per selected item, in list order. */
    perform: (item: T, position: number, total: number) => Promise<void>;
}

/**
 * Paged multi-select screen shared by every "pick tickets, then act on
 * them" command. Returns the number of items acted on, or 0 on quit.
 */
export async function runSelectionLoop<T>(
    terminal: Terminal,
    items: readonly T[],
    options: SelectionLoopOptions<T>
): Promise<number> {
    const byId = new Map(items.map(item => [options.idOf(item), item] as const));
    let state = createSelectionState(items.map(options.idOf), options.pageSize);

    for (;;) {
        const start = state.page * state.pageSize;
        terminal.print(fmt.section(
            `Page ${state.page + 1} of ${pageCount(state)} (${state.ids.length} tickets, ${state.selected.size} selected)`
        ));
        if (options.header) terminal.print(options.header);
        pageIds(state).forEach((id, i) => {
            const item = byId.get(id);
            if (item !== undefined) terminal.print(options.renderRow(item, start + i + 1, state.selected.has(id)));
        });
        terminal.print();
        terminal.print(actionMenu(state, options.action));

        const parsed = parseSelectionCommand(await terminal.ask(fmt.prompt('> ')), options.action);
        if (!parsed.ok) {
            terminal.print(fmt.warning(parsed.error));
            continue;
        }

        const step = reduceSelection(state, parsed.command);
        state = step.state;
        if (step.notice) terminal.print(fmt.info(step.notice));

        if (step.outcome === 'quit') return 0;
        if (step.outcome === 'act') break;
    }

    const chosen = state.ids.filter(id => state.selected.has(id));
    for (const [i, id] of chosen.entries()) {
        const item = byId.get(id);
        if (item !== undefined) await options.perform(item, i + 1, chosen.length);
    }
    return chosen.length;
}

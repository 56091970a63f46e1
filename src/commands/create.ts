import { fmt } from '../core/console.js';
import { requireDefaultProject } from '../core/config.js';
import { isEpic } from '../tracker/children.js';
import { TrackerError } from '../tracker/errors.js';
import { normalizeTicketKey } from '../tracker/jql.js';
import { CreateTicketRequest, Ticket } from '../tracker/types.js';
import { askMenuChoice, askYesNo } from '../ui/ask.js';
import { CommandDeps } from './deps.js';
import { generateAndApplyDescription, resolveEpicLinkField, truncate } from './shared.js';

export interface CreateOptions {
    project?: string;
    type?: string;
    parent?: string;
}

/**
 * Join the summary words. A leading `spike` becomes the `SPIKE:` prefix,
 * so `create spike auth options` gives `SPIKE: auth options`.
 */
export function normalizeSummary(words: readonly string[]): string {
    if (words.length > 0 && words[0].toLowerCase() === 'spike') {
        const rest = words.slice(1).join(' ').trim();
        return rest ? `SPIKE: ${rest}` : 'SPIKE';
    }
    return words.join(' ').trim();
}

async function loadRecentParents(deps: CommandDeps): Promise<Ticket[]> {
    const tickets: Ticket[] = [];
    for (const key of await deps.state.recentParents()) {
        try {
            tickets.push(await deps.tracker.getTicket(key));
        } catch (error) {
            if (!(error instanceof TrackerError)) throw error;
            // Deleted or moved since it was used; leave it out of the menu
            deps.logger.debug('Recent parent unavailable', { component: 'create', key, error: error.message });
        }
    }
    return tickets;
}

async function askParentKey(deps: CommandDeps, project: string): Promise<Ticket | undefined> {
    const answer = (await deps.terminal.ask(fmt.prompt('Parent ticket key (Enter for none): '))).trim();
    if (!answer) return undefined;
    return deps.tracker.getTicket(normalizeTicketKey(answer, project));
}

/**
 * Recent parents first; "Other..." or an empty history asks for a key.
 */
export async function selectParent(deps: CommandDeps, project: string): Promise<Ticket | undefined> {
    const recent = await loadRecentParents(deps);
    if (recent.length === 0) {
        return askParentKey(deps, project);
    }

    const labels = recent.map(ticket => `${ticket.key} [${ticket.issueType}]: ${truncate(ticket.summary, 50)}`);
    labels.push('Other...');
    const choice = await askMenuChoice(deps.terminal, 'Recent parent tickets (Enter for none):', labels, {
        allowEmpty: true,
    });

    if (choice === undefined) return undefined;
    if (choice === recent.length) return askParentKey(deps, project);
    return recent[choice];
}

/**
 * `create <SUMMARY...>`: create a ticket, optionally under a parent, then
 * offer the description flow. Returns the new key.
 */
export async function runCreate(deps: CommandDeps, words: readonly string[], options: CreateOptions = {}): Promise<string> {
    const summary = normalizeSummary(words);
    const project = requireDefaultProject(deps.config, options.project);
    const issueType = options.type || deps.config.defaultTaskType;

    const parent = options.parent
        ? await deps.tracker.getTicket(normalizeTicketKey(options.parent, project))
        : await selectParent(deps, project);

    const request: CreateTicketRequest = { project, issueType, summary };
    if (parent && isEpic(parent)) {
        request.epicLink = { fieldId: await resolveEpicLinkField(deps), epicKey: parent.key };
    } else if (parent) {
        request.parentKey = parent.key;
    }

    const key = await deps.tracker.createTicket(request);
    deps.logger.info('Ticket created', { component: 'create', key, summary });

    if (parent) await deps.state.addRecentParent(parent.key);
    await deps.state.addRecentParent(key);

    if (await askYesNo(deps.terminal, 'Would you like to generate the description with AI?', false)) {
        await generateAndApplyDescription(deps, { key, summary, issueType, description: '' });
    }
    return key;
}

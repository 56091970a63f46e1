import { fmt } from '../core/console.js';
import { getChildTickets } from '../tracker/children.js';
import { normalizeTicketKey } from '../tracker/jql.js';
import { CommandDeps } from './deps.js';
import { generateAndApplyDescription } from './shared.js';

/**
 * `describe <KEY>`: write or improve a ticket description through the Q&A flow.
 */
export async function runDescribe(deps: CommandDeps, rawKey: string): Promise<boolean> {
    const key = normalizeTicketKey(rawKey, deps.config.defaultProject);

    deps.terminal.print(fmt.info(`Fetching ticket details for ${key}...`));
    const ticket = await deps.tracker.getTicket(key);
    const children = await getChildTickets(deps.tracker, ticket, deps.config.epicLinkFieldId);

    return generateAndApplyDescription(deps, ticket, children.map(child => child.summary));
}

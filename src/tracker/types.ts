export interface Ticket {
    key: string;
    summary: string;
    description: string;
    status: string;
    issueType: string;
    priority?: string;
    assignee?: string;
    /** 0 when the story points field is unset. */
    storyPoints: number;
    components: string[];
}

export interface ExistingChildTicket {
    key: string;
    summary: string;
    storyPoints: number;
    type: string;
}

export interface CreateTicketRequest {
    project: string;
    issueType: string;
    summary: string;
    /** Sets the `parent` field (sub-tasks and next-gen hierarchies). */
    parentKey?: string;
    /** Links to an epic through the epic link custom field instead of `parent`. */
    epicLink?: { fieldId: string; epicKey: string };
}

export interface Transition {
    id: string;
    name: string;
    toStatus: string;
}

export interface TicketComment {
    id: string;
    author: string;
    created: string;
    body: string;
}

/**
 * What the commands need from the issue tracker.
 */
export interface TicketClient {
    getTicket(key: string): Promise<Ticket>;
    /** Searches with the configured ticket filter applied. */
    searchTickets(jql: string): Promise<Ticket[]>;
    createTicket(request: CreateTicketRequest): Promise<string>;
    updateDescription(key: string, description: string): Promise<void>;
    updateStoryPoints(key: string, points: number): Promise<void>;
    getTransitions(key: string): Promise<Transition[]>;
    transition(key: string, transitionId: string): Promise<void>;
    getComments(key: string): Promise<TicketComment[]>;
    /** Finds the epic link custom field, or undefined when the instance has none. */
    detectEpicLinkField(): Promise<string | undefined>;
}

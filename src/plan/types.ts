export interface ProposedTicket {
    summary: string;
    /** 0 when the plan text carried no recognizable points annotation. */
    storyPoints: number;
    isExisting: boolean;
    /** Only set for existing tickets. */
    key?: string;
}

export interface DecompositionPlan {
    newTickets: ProposedTicket[];
    existingTickets: ProposedTicket[];
}

export interface EpicTask {
    summary: string;
}

export interface EpicPlan {
    title: string;
    description: string;
    tasks: EpicTask[];
}

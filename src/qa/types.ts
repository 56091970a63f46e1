export interface Question {
    text: string;
    /** 1-based order in which the question is asked. */
    position: number;
}

export interface AnswerPair {
    readonly question: string;
    readonly answer: string;
    /** The user turned the question down; history shows it without an answer. */
    readonly rejected?: boolean;
}

/**
 * Supplies answers for interactive collection. Implementations show the
 * question themselves.
 */
export interface AnswerReader {
    read(question: Question, total: number): Promise<string>;
}

export type AnswerSource =
    | { method: 'interactive'; reader: AnswerReader }
    /** Answers by question position; missing entries are blank answers. */
    | { method: 'structured'; answers: readonly string[] };

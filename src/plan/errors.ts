/**
 * Raised when generated plan text cannot be turned into a plan.
 * Carries the raw text so callers can show it next to the error.
 */
export class PlanParseError extends Error {
    constructor(message: string, public readonly rawText: string) {
        super(message);
        this.name = 'PlanParseError';
    }
}

export class MissingTitleError extends PlanParseError {
    constructor(rawText: string) {
        super('epic title not found. Expected format: # EPIC: Title', rawText);
        this.name = 'MissingTitleError';
    }
}

export class MissingTasksError extends PlanParseError {
    constructor(rawText: string) {
        super('TASKS section not found. Expected format: ## TASKS', rawText);
        this.name = 'MissingTasksError';
    }
}

export class EmptyTasksError extends PlanParseError {
    constructor(rawText: string) {
        super('no tasks found in TASKS section', rawText);
        this.name = 'EmptyTasksError';
    }
}

export class PlanValidationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'PlanValidationError';
    }
}

export class EmptySummaryError extends PlanValidationError {
    constructor(public readonly index: number) {
        super(`ticket ${index} has an empty summary`);
        this.name = 'EmptySummaryError';
    }
}

export class InvalidPointsError extends PlanValidationError {
    constructor(public readonly summary: string, public readonly value: number) {
        super(`ticket "${summary}" has invalid story points: ${value}`);
        this.name = 'InvalidPointsError';
    }
}

export class PointsExceedLimitError extends PlanValidationError {
    constructor(
        public readonly summary: string,
        public readonly value: number,
        public readonly limit: number
    ) {
        super(`ticket "${summary}" has ${value} story points, exceeding the limit of ${limit}`);
        this.name = 'PointsExceedLimitError';
    }
}

export type ErrorContext = Record<string, string | number | boolean | undefined>;

export class TabuSearchError extends Error {
    readonly context: ErrorContext;

    constructor(message: string, context: ErrorContext = {}) {
        super(message);
        this.name = new.target.name;
        this.context = context;
    }
}

/** Invalid input detected before the search starts */
export class ConfigurationError extends TabuSearchError {}

/** A tour stopped being a permutation of all cities. Always an engine bug. */
export class InvalidTourError extends TabuSearchError {
    readonly iteration: number | undefined;

    constructor(message: string, iteration?: number) {
        super(iteration === undefined ? message : `${message} (iteration ${iteration})`, { iteration });
        this.iteration = iteration;
    }
}

/** An engine was asked to run after it already left its initial phase */
export class EngineStateError extends TabuSearchError {}

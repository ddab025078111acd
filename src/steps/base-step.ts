import { logger } from "../utils/core/logger.js";

/** Raised when a coding stage is wired or ordered wrongly. */
abstract class StepError extends Error {
    override name = "BaseStep.Error";
    constructor(message: string, source?: string) {
        super(`${source ?? logger.source ?? "BaseStep"}: ${message}`);
    }
}

/**
 * One stage of a coding run (open coding, filtering, axial, selective, storyline).
 *
 * A stage reads the results of the stages listed in `dependsOn`, runs at most
 * once, and exposes its tables through getters that throw until it has run.
 */
export abstract class BaseStep {
    /** Stages whose results this one reads */
    abstract dependsOn?: BaseStep[];
    /** Set once the stage body returned */
    executed = false;
    /** Set when this stage or one it reads from failed */
    aborted = false;

    /** Position in the job, "1" to "5" */
    _id = "";
    /** Log source, e.g. "3 AxialStep" */
    protected get _prefix() {
        return `${this._id ? `${this._id} ` : ""}${this.constructor.name}`;
    }

    static Error = StepError;
    /** The job did not assign an id */
    static InternalError = class extends BaseStep.Error {
        override name = "BaseStep.InternalError";
    };

    /** A result was read before the stage ran */
    static UnexecutedError = class extends BaseStep.Error {
        override name = "BaseStep.UnexecutedError";
        constructor(source?: string) {
            super("Step has not been executed yet", source);
        }
    };
    /** The stage, or a stage it reads from, failed */
    static AbortedError = class extends BaseStep.Error {
        override name = "BaseStep.AbortedError";
        constructor(source?: string) {
            super("Step has been aborted", source);
        }
    };

    /** The job ran a stage twice */
    static ConfigError = class extends BaseStep.Error {
        override name = "BaseStep.ConfigError";
    };

    /**
     * Check that this stage may run now: it has an id, has not run or failed,
     * and every stage it reads from has finished. Subclasses call this before `_run`.
     */
    execute() {
        logger.withSource(this._prefix, "execute", () => {
            if (!this._id) {
                throw new BaseStep.InternalError("Step ID is not set");
            }
            if (this.executed) {
                throw new BaseStep.ConfigError(
                    "Step has already been executed, please check job configuration",
                );
            }
            if (this.aborted) {
                throw new BaseStep.AbortedError();
            }
            // an upstream failure aborts this stage too
            if (this.dependsOn) {
                for (const step of this.dependsOn) {
                    if (step.aborted) {
                        this.abort(step);
                        throw new BaseStep.AbortedError();
                    }
                    if (!step.executed) {
                        throw new BaseStep.UnexecutedError();
                    }
                }
            }
        });

        return Promise.resolve();
    }

    /**
     * Run the step body under the step's log source.
     * A failure aborts the step and propagates; success marks it executed.
     */
    protected async _run(body: () => Promise<void>) {
        try {
            await logger.withSource(this._prefix, "execute", body);
        } catch (error) {
            this.abort();
            throw error;
        }
        this.executed = true;
    }

    /** Read a result, failing if the step has not produced it yet. */
    protected _result<T>(value: T | undefined, name: string): T {
        if (!this.executed || value === undefined) {
            throw new BaseStep.UnexecutedError(logger.prefixed(this._prefix, name));
        }
        return value;
    }

    /** Stop this stage; `dep` names the upstream stage that failed. */
    abort(dep?: BaseStep) {
        logger.withSource(this._prefix, "abort", () => {
            logger.warn(`Aborting${dep ? `: dependency ${dep._id} aborted` : ""}`);
            this.aborted = true;
        });
    }
}

import { FlowTxError, SubmissionError } from "@flow-tx/helpers";

/** Runs one access-node call, reporting transport failures as {@link SubmissionError}. */
export async function wrapAccessError<T>(operation: string, call: () => Promise<T>): Promise<T> {
    try {
        return await call();
    } catch (err) {
        if (err instanceof FlowTxError) {
            throw err;
        }
        throw new SubmissionError(`Access node call ${operation} failed`, {
            cause: err,
            details: { operation },
        });
    }
}

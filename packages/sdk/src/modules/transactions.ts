import { bytesToHex, stripHexPrefix, TransactionStateError } from "@flow-tx/helpers";
import type { AddressInput, BytesLike } from "@flow-tx/helpers";

import { TransactionStatus } from "../core/client";
import type { FlowClientContext, TransactionResultInfo } from "../core/client";
import { signTransaction, TransactionBuilder } from "../domain/transactions";
import type { SignerCredential, Transaction, TransactionArgumentInput } from "../domain/transactions";
import { calculatePollDelay, delay } from "../retry";
import type { PollingConfig } from "../retry";
import { getProposerSequenceNumber } from "./accounts";
import { getReferenceBlockId } from "./blocks";
import { wrapAccessError } from "./helpers";

export interface ProposerConfig {
    address: AddressInput;
    keyIndex: number;
    /** Fetched from the proposer account when omitted */
    sequenceNumber?: bigint | number;
}

export interface BuildTransactionOptions {
    script: string | Uint8Array;
    arguments?: TransactionArgumentInput[];
    /** Latest sealed block when omitted */
    referenceBlockId?: BytesLike;
    /** Configured gas limit when omitted */
    gasLimit?: bigint | number;
    proposer: ProposerConfig;
    authorizers?: AddressInput[];
    payer: AddressInput;
}

export interface BuildAndSignTransactionOptions extends BuildTransactionOptions {
    payloadSigners: SignerCredential[];
    envelopeSigners: SignerCredential[];
}

export type TransactionOutcome =
    | { kind: "success"; id: string; result: TransactionResultInfo }
    | { kind: "user-error"; id: string; result: TransactionResultInfo; errorMessage: string }
    | { kind: "runtime-error"; id: string; result: TransactionResultInfo; errorMessage: string }
    | { kind: "unknown"; id: string; attempts: number };

const PENDING_STATUSES: ReadonlySet<number> = new Set<number>([
    TransactionStatus.UNKNOWN,
    TransactionStatus.PENDING,
    TransactionStatus.FINALIZED,
    TransactionStatus.EXECUTED,
]);

export async function buildTransaction(ctx: FlowClientContext, options: BuildTransactionOptions): Promise<Transaction> {
    const referenceBlockId = options.referenceBlockId ?? (await getReferenceBlockId(ctx));
    const sequenceNumber =
        options.proposer.sequenceNumber ??
        (await getProposerSequenceNumber(ctx, options.proposer.address, options.proposer.keyIndex));

    return createTransactionBuilder().build({
        script: options.script,
        arguments: options.arguments,
        referenceBlockId,
        gasLimit: options.gasLimit ?? ctx.config.gasLimit,
        proposer: {
            address: options.proposer.address,
            keyIndex: options.proposer.keyIndex,
            sequenceNumber,
        },
        authorizers: options.authorizers,
        payer: options.payer,
    });
}

export async function buildAndSignTransaction(
    ctx: FlowClientContext,
    options: BuildAndSignTransactionOptions,
): Promise<Transaction> {
    const transaction = await buildTransaction(ctx, options);
    return signTransaction(transaction, options.payloadSigners, options.envelopeSigners);
}

/** Submits a fully-signed transaction and returns the id the node assigned, as hex. */
export async function sendTransaction(ctx: FlowClientContext, transaction: Transaction): Promise<string> {
    if (transaction.state !== "fully-signed") {
        throw new TransactionStateError(`Cannot submit a ${transaction.state} transaction`);
    }
    const message = transaction.toMessage();
    const response = await wrapAccessError("sendTransaction", () => ctx.access.sendTransaction(message));
    const id = response instanceof Uint8Array ? bytesToHex(response) : stripHexPrefix(response).toLowerCase();
    ctx.logger.info("Submitted transaction", {
        id,
        payloadSignatures: message.payloadSignatures.length,
        envelopeSignatures: message.envelopeSignatures.length,
    });
    return id;
}

/**
 * Classifies a result: `undefined` while pending, otherwise the terminal outcome.
 * SEALED is final; EXPIRED and any unrecognised status are runtime errors.
 */
export function classifyTransactionResult(id: string, result: TransactionResultInfo): TransactionOutcome | undefined {
    if (PENDING_STATUSES.has(result.status)) {
        return undefined;
    }
    if (result.status === TransactionStatus.SEALED) {
        return result.statusCode === 0
            ? { kind: "success", id, result }
            : { kind: "user-error", id, result, errorMessage: result.errorMessage };
    }
    const errorMessage =
        result.status === TransactionStatus.EXPIRED
            ? "Transaction expired before it was sealed"
            : `Unrecognised transaction status ${result.status}`;
    return { kind: "runtime-error", id, result, errorMessage: result.errorMessage || errorMessage };
}

/**
 * Polls until the transaction reaches a terminal status or the attempts run out.
 * The delay grows linearly between attempts.
 */
export async function waitForTransaction(
    ctx: FlowClientContext,
    id: string,
    polling: Partial<PollingConfig> = {},
): Promise<TransactionOutcome> {
    const config: PollingConfig = { ...ctx.config.polling, ...polling };
    for (let attempt = 0; attempt < config.maxAttempts; attempt++) {
        await delay(calculatePollDelay(attempt, config));
        const result = await wrapAccessError("getTransactionResult", () => ctx.access.getTransactionResult(id));
        const outcome = classifyTransactionResult(id, result);
        if (outcome) {
            ctx.logger.info("Transaction reached a terminal status", { id, kind: outcome.kind, attempt });
            return outcome;
        }
        ctx.logger.debug("Transaction pending", { id, status: result.status, attempt });
    }
    ctx.logger.warn("Gave up waiting for transaction", { id, attempts: config.maxAttempts });
    return { kind: "unknown", id, attempts: config.maxAttempts };
}

export async function sendAndWait(
    ctx: FlowClientContext,
    transaction: Transaction,
    polling: Partial<PollingConfig> = {},
): Promise<TransactionOutcome> {
    const id = await sendTransaction(ctx, transaction);
    return waitForTransaction(ctx, id, polling);
}

function createTransactionBuilder(): TransactionBuilder {
    return new TransactionBuilder();
}

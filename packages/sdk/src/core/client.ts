import { resolveSdkConfig } from "../config";
import type { SdkConfig, SdkConfigInput } from "../config";
import type { TransactionMessage } from "../domain/transactions";
import { createConsoleLogger } from "../logger";
import type { TxLogger } from "../logger";

export enum TransactionStatus {
    UNKNOWN = 0,
    PENDING = 1,
    FINALIZED = 2,
    EXECUTED = 3,
    SEALED = 4,
    EXPIRED = 5,
}

export interface BlockInfo {
    /** 32-byte block id, as bytes or hex */
    id: Uint8Array | string;
    height: bigint;
}

export interface AccountKeyInfo {
    index: number;
    sequenceNumber: bigint | number;
    revoked?: boolean;
}

export interface AccountInfo {
    address: Uint8Array | string;
    keys: AccountKeyInfo[];
}

export interface TransactionEventInfo {
    type: string;
    /** JSON value record, as UTF-8 bytes or a string */
    payload: Uint8Array | string;
}

export interface TransactionResultInfo {
    status: number;
    /** Non-zero when the script aborted */
    statusCode: number;
    errorMessage: string;
    events: TransactionEventInfo[];
}

/**
 * Remote access node API, implemented by the caller over its own transport.
 * The SDK only reads the latest block and account keys, submits signed
 * transactions and polls their results.
 */
export interface AccessApi {
    getLatestBlock(sealed: boolean): Promise<BlockInfo>;
    getAccount(address: Uint8Array): Promise<AccountInfo>;
    /** Resolves to the transaction id (bytes or hex) assigned by the node. */
    sendTransaction(message: TransactionMessage): Promise<Uint8Array | string>;
    getTransactionResult(id: string): Promise<TransactionResultInfo>;
}

export interface FlowClientConfig extends SdkConfigInput {
    access: AccessApi;
    logger?: TxLogger;
}

export interface FlowClientContext {
    access: AccessApi;
    config: SdkConfig;
    logger: TxLogger;
}

export function createFlowClientContext(options: FlowClientConfig): FlowClientContext {
    const { access, logger, ...configInput } = options;
    const config = resolveSdkConfig(configInput);
    return {
        access,
        config,
        logger: logger ?? createConsoleLogger("FlowTx", config.logLevel),
    };
}

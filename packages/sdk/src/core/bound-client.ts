import type { AddressInput } from "@flow-tx/helpers";

import type { Transaction } from "../domain/transactions";
import * as accountsModule from "../modules/accounts";
import * as blocksModule from "../modules/blocks";
import * as transactionsModule from "../modules/transactions";
import type { PollingConfig } from "../retry";
import type { FlowClientContext, TransactionResultInfo } from "./client";

interface BoundTransactions {
    build(options: transactionsModule.BuildTransactionOptions): Promise<Transaction>;
    buildAndSign(options: transactionsModule.BuildAndSignTransactionOptions): Promise<Transaction>;
    send(transaction: Transaction): Promise<string>;
    wait(id: string, polling?: Partial<PollingConfig>): Promise<transactionsModule.TransactionOutcome>;
    sendAndWait(
        transaction: Transaction,
        polling?: Partial<PollingConfig>,
    ): Promise<transactionsModule.TransactionOutcome>;
}

interface BoundAccounts {
    getSequenceNumber(address: AddressInput, keyIndex: number): Promise<bigint>;
    createdAddresses(result: TransactionResultInfo): string[];
}

interface BoundBlocks {
    getReferenceBlockId(): Promise<Uint8Array>;
}

export interface FlowTx {
    ctx: FlowClientContext;
    transactions: BoundTransactions;
    accounts: BoundAccounts;
    blocks: BoundBlocks;
}

export function createBoundFlowTxClient(ctx: FlowClientContext): FlowTx {
    return {
        ctx,
        transactions: {
            build: (options) => transactionsModule.buildTransaction(ctx, options),
            buildAndSign: (options) => transactionsModule.buildAndSignTransaction(ctx, options),
            send: (transaction) => transactionsModule.sendTransaction(ctx, transaction),
            wait: (id, polling) => transactionsModule.waitForTransaction(ctx, id, polling),
            sendAndWait: (transaction, polling) => transactionsModule.sendAndWait(ctx, transaction, polling),
        },
        accounts: {
            getSequenceNumber: (address, keyIndex) => accountsModule.getProposerSequenceNumber(ctx, address, keyIndex),
            createdAddresses: accountsModule.createdAccountAddresses,
        },
        blocks: {
            getReferenceBlockId: () => blocksModule.getReferenceBlockId(ctx),
        },
    };
}

import { decodeAddress } from "@flow-tx/helpers";

import { signTransaction } from "./signing";
import { Transaction } from "./Transaction";
import type { BuildTransactionParams, SignerCredential } from "./types";
import { parseAddressList, parseArguments, parseReferenceBlockId, parseScript, parseUint64 } from "./utils";

export interface BuildAndSignParams extends BuildTransactionParams {
    payloadSigners: SignerCredential[];
    envelopeSigners: SignerCredential[];
}

export class TransactionBuilder {
    build(params: BuildTransactionParams): Transaction {
        return new Transaction({
            script: parseScript(params.script),
            arguments: parseArguments(params.arguments),
            referenceBlockId: parseReferenceBlockId(params.referenceBlockId),
            gasLimit: parseUint64(params.gasLimit, "Gas limit"),
            proposalKey: {
                address: decodeAddress(params.proposer.address, "Proposer address"),
                keyIndex: params.proposer.keyIndex,
                sequenceNumber: parseUint64(params.proposer.sequenceNumber, "Proposer sequence number"),
            },
            authorizers: parseAddressList(params.authorizers ?? [], "Authorizer"),
            payer: decodeAddress(params.payer, "Payer address"),
        });
    }

    buildAndSign(params: BuildAndSignParams): Transaction {
        const transaction = this.build(params);
        return signTransaction(transaction, params.payloadSigners, params.envelopeSigners);
    }
}

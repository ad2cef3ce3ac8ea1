import { decodeAddress, encodeAddress, InvalidArgumentError } from "@flow-tx/helpers";
import type { AddressInput } from "@flow-tx/helpers";

import type { FlowClientContext, TransactionResultInfo } from "../core/client";
import { compositeField, decodeArgument } from "../domain/arguments";
import { wrapAccessError } from "./helpers";

const ACCOUNT_CREATED_EVENT = "flow.AccountCreated";

/** Current sequence number of one of the proposer's keys. */
export async function getProposerSequenceNumber(
    ctx: FlowClientContext,
    address: AddressInput,
    keyIndex: number,
): Promise<bigint> {
    const addressBytes = decodeAddress(address, "Proposer address");
    const account = await wrapAccessError("getAccount", () => ctx.access.getAccount(addressBytes));
    const key = account.keys.find((candidate) => candidate.index === keyIndex);
    if (!key) {
        throw new InvalidArgumentError(`Account ${encodeAddress(addressBytes)} has no key ${keyIndex}`);
    }
    if (key.revoked) {
        throw new InvalidArgumentError(`Key ${keyIndex} of account ${encodeAddress(addressBytes)} is revoked`);
    }
    ctx.logger.debug("Fetched proposer sequence number", {
        address: encodeAddress(addressBytes),
        keyIndex,
    });
    return BigInt(key.sequenceNumber);
}

/** Addresses of the accounts announced by `flow.AccountCreated` events in a result. */
export function createdAccountAddresses(result: TransactionResultInfo): string[] {
    const addresses: string[] = [];
    for (const event of result.events) {
        if (event.type !== ACCOUNT_CREATED_EVENT) {
            continue;
        }
        const field = compositeField(decodeArgument(event.payload).toJSON(), "address");
        if (field?.type !== "Address") {
            throw new InvalidArgumentError(`${ACCOUNT_CREATED_EVENT} event has no address field`);
        }
        addresses.push(field.value);
    }
    return addresses;
}

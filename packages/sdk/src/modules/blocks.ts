import type { FlowClientContext } from "../core/client";
import { parseReferenceBlockId } from "../domain/transactions/utils";
import { wrapAccessError } from "./helpers";

/** Id of the latest sealed block, used as a transaction's reference block. */
export async function getReferenceBlockId(ctx: FlowClientContext): Promise<Uint8Array> {
    const block = await wrapAccessError("getLatestBlock", () => ctx.access.getLatestBlock(true));
    ctx.logger.debug("Fetched reference block", { height: block.height.toString() });
    return parseReferenceBlockId(block.id);
}

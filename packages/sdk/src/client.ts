import { createBoundFlowTxClient, type FlowTx } from "./core/bound-client";
import { createFlowClientContext, type FlowClientConfig } from "./core/client";

// ============================================================================
// Type Exports
// ============================================================================
export type { FlowTx } from "./core/bound-client";
export type { FlowClientConfig } from "./core/client";

// ============================================================================
// Value Exports (functions)
// ============================================================================
export function createFlowTxClient(config: FlowClientConfig): FlowTx {
    const ctx = createFlowClientContext(config);
    return createBoundFlowTxClient(ctx);
}

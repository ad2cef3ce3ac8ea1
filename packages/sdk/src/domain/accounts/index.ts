export { accountKeysArgument, encodeAccountKey } from "./AccountKey";
export type { AccountKeyParams } from "./AccountKey";

export * from "./client";
export * from "./sdk";

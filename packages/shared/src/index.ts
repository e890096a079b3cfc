export * from "./freeze";
export * from "./errors";
export * from "./retry";
export * from "./validation";

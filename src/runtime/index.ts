export * from "./events";
export * from "./retry";

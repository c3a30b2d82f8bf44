/**
 * Hustleflow engine: stations, tasks and the hustle that walks them.
 *
 * Tasks build on PocketFlow's Node; its primitives are re-exported for
 * callers that mix the two.
 */

export { BaseNode, Node } from "pocketflow";

export * from "./types";
export * from "./clone";
export * from "./station";
export * from "./task";
export * from "./hustle";

/**
 * Resolver モジュール
 */

export { resolveDocument, resolveValue, ResolutionFault } from "./resolver.js";
export type { ResolutionFaultCode } from "./resolver.js";

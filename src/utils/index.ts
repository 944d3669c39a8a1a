/**
 * Utils barrel exports
 */

export * from "./text/nameNormalization";
export * from "./catalogValidation";
export * from "./sheets/sheetsHelpers";

/**
 * Fan-in combinator exports.
 */

export { Zipper, loaderLeg, mapLeg, multiplexerLeg } from "./zipper.js";

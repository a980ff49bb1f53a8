export const PRODUCT = "mdserve";
export const VERSION = "0.1.0";

/** Value of the `Server` header sent on every response. */
export const SERVER_HEADER = `${PRODUCT}/${VERSION}`;

export const BANNER = `[${PRODUCT} v${VERSION}]`;

/** Package version, recorded with every saved run and sent in the User-Agent. */
export const VERSION = '1.0.0';

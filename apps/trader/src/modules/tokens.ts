export const LOGGER = Symbol("LOGGER");
export const RUN_OPTIONS = Symbol("RUN_OPTIONS");
export const EXCHANGE_GATEWAY = Symbol("EXCHANGE_GATEWAY");

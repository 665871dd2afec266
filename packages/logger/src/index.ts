export * from "./interface.js";
export {getEmptyLogger} from "./empty.js";
export {getEnvLogLevel, getEnvLogger} from "./env.js";
export {createWinstonLogger, WinstonLogger} from "./winston.js";
export {getFormat} from "./utils/format.js";

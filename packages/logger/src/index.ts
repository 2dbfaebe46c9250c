export * from "./interface.js";
export {WinstonLogger} from "./winston.js";

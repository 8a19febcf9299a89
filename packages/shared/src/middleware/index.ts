export { queryErrorHandler, statusReason } from "./error-handler.js";

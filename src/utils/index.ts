export {
	Logger,
	getLogger,
	type LoggerConfig,
} from "./Logger";
export { LogLevel } from "../config/logging";
export {
	LogWriter,
	getLogWriter,
	resetLogWriter,
	type LogWriterConfig,
} from "./LogWriter";
export { sleep } from "./sleep";

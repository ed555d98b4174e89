/**
 * @vantage/shared - shared infrastructure for Vantage services
 */

export {
    Logger,
    type LogEntry,
    type LoggerConfig,
    LogLevel,
    type LogMetadata,
    type PerformanceTimer,
} from "./logger/Logger";

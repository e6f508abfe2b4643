import { OutputStream } from "./output-stream.js";

//----------------------------------------------------------------------------------------------------------------------
// Log levels
//----------------------------------------------------------------------------------------------------------------------

export class LogLevel {

    private static readonly LOG_LEVEL_ERROR = 1;
    private static readonly LOG_LEVEL_WARN = 2;
    private static readonly LOG_LEVEL_INFO = 3;
    private static readonly LOG_LEVEL_DEBUG = 4;

    public static readonly ERROR = new LogLevel(LogLevel.LOG_LEVEL_ERROR, "ERROR  ");
    public static readonly WARN = new LogLevel(LogLevel.LOG_LEVEL_WARN, "WARNING");
    public static readonly INFO = new LogLevel(LogLevel.LOG_LEVEL_INFO, "INFO   ");
    public static readonly DEBUG = new LogLevel(LogLevel.LOG_LEVEL_DEBUG, "DEBUG  ");

    private constructor(public readonly index: number, public readonly paddedName: string) { }
}

//----------------------------------------------------------------------------------------------------------------------
// A logger that writes timestamped lines to an output stream
//----------------------------------------------------------------------------------------------------------------------

export class Logger {

    public static readonly PADDING = "\n                              ";

    public static readonly LENGTH_YEAR = 4;
    public static readonly LENGTH_MONTH = 2;
    public static readonly LENGTH_DAY = 2;
    public static readonly LENGTH_HOURS = 2;
    public static readonly LENGTH_MINUTES = 2;
    public static readonly LENGTH_SECONDS = 2;
    public static readonly LENGTH_MILLISECONDS = 3;

    //------------------------------------------------------------------------------------------------------------------
    // Initialization
    //------------------------------------------------------------------------------------------------------------------

    public constructor(public readonly logLevel: LogLevel, protected readonly outputStream: OutputStream) { }

    //------------------------------------------------------------------------------------------------------------------
    // Add log entries for different severities
    //------------------------------------------------------------------------------------------------------------------

    public debug(...message: (string | object)[]) {
        this.formatAndAppend(LogLevel.DEBUG, message);
    }

    public info(...message: (string | object)[]) {
        this.formatAndAppend(LogLevel.INFO, message);
    }

    public warn(...message: (string | object)[]) {
        this.formatAndAppend(LogLevel.WARN, message);
    }

    public error(...message: (string | object)[]) {
        this.formatAndAppend(LogLevel.ERROR, message);
    }

    //------------------------------------------------------------------------------------------------------------------
    // Check if messages of the given level would be written
    //------------------------------------------------------------------------------------------------------------------

    public isEnabled(logLevel: LogLevel) {
        return logLevel.index <= this.logLevel.index;
    }

    //------------------------------------------------------------------------------------------------------------------
    // Format the line and pass it to the output stream
    //------------------------------------------------------------------------------------------------------------------

    private formatAndAppend(logLevel: LogLevel, messages: (string | object)[]) {
        if (this.isEnabled(logLevel)) {
            this.outputStream.logAligned(
                Logger.PADDING, Logger.getCurrentTimestamp(), logLevel.paddedName, ...messages
            );
        }
    }

    //------------------------------------------------------------------------------------------------------------------
    // Obtain the current timestamp
    //------------------------------------------------------------------------------------------------------------------

    private static getCurrentTimestamp() {
        const now = new Date();
        return [
            this.formatNumber(now.getFullYear(), Logger.LENGTH_YEAR),
            "-",
            this.formatNumber(now.getMonth() + 1, Logger.LENGTH_MONTH),
            "-",
            this.formatNumber(now.getDate(), Logger.LENGTH_DAY),
            " ",
            this.formatNumber(now.getHours(), Logger.LENGTH_HOURS),
            ":",
            this.formatNumber(now.getMinutes(), Logger.LENGTH_MINUTES),
            ":",
            this.formatNumber(now.getSeconds(), Logger.LENGTH_SECONDS),
            ".",
            this.formatNumber(now.getMilliseconds(), Logger.LENGTH_MILLISECONDS),
        ].join("");
    }

    //------------------------------------------------------------------------------------------------------------------
    // Pad a number with leading zeros
    //------------------------------------------------------------------------------------------------------------------

    public static formatNumber(number: number, length: number) {
        const result = number.toFixed(0);
        return "00000000000000000000".substring(0, Math.max(0, length - result.length)) + result;
    }
}

import { Logger, LogLevel } from "../utils/logger.js";
import { NullOutputStream } from "../utils/output-stream.js";

//----------------------------------------------------------------------------------------------------------------------
// Options for transaction logs
//----------------------------------------------------------------------------------------------------------------------

export interface TransactionLogOptions {
    logger: Logger;
    verifyIntegrity: boolean;
}

//----------------------------------------------------------------------------------------------------------------------
// Default options: silent and without integrity checks after each modification
//----------------------------------------------------------------------------------------------------------------------

export const DEFAULT_TRANSACTION_LOG_OPTIONS: Readonly<TransactionLogOptions> = {
    logger: new Logger(LogLevel.ERROR, new NullOutputStream()),
    verifyIntegrity: false
};

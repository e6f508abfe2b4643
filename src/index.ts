export { LogIntegrityViolation, OwnershipInvariantViolation, StaleNodeException } from "./data/exception.js";
export { Optional } from "./data/optional.js";
export { DEFAULT_TRANSACTION_LOG_OPTIONS, type TransactionLogOptions } from "./data/options.js";
export { ForwardTransactionLog } from "./features/forward-transaction-log.js";
export { LinkedLog } from "./features/linked-log.js";
export { LogCursor } from "./features/log-cursor.js";
export { LogNode } from "./features/log-node.js";
export { NodeArena, type SlotKey } from "./features/node-arena.js";
export { TransactionLog } from "./features/transaction-log.js";
export { LogLevel, Logger } from "./utils/logger.js";
export { ConsoleOutputStream, MemoryOutputStream, NullOutputStream, OutputStream } from "./utils/output-stream.js";

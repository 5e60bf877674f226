export { assert, describe, test } from "./nodeTest.js";
export { createEventLog, type EventLog } from "./eventLog.js";
export { expectTrellisError } from "./errors.js";

/**
 * @stockbook/recorder — Atomic recording of expenses and usage.
 *
 * Commits each business record together with the stock movement it
 * implies. No partial state is ever observable.
 */

export { TransactionRecorder, toRecorderError, DEFAULT_USAGE_REASON } from "./recorder.js";
export type { TransactionRecorderOptions } from "./recorder.js";

export type {
  ExpenseInput,
  UsageInput,
  Recorded,
  RecordedExpense,
  RecordedUsage,
  ReferenceDirectory,
  RecorderLogger,
  RecorderErrorCode,
} from "./types.js";

export { RecorderError } from "./types.js";

export {
  InMemoryCatalog,
  StaticSupplier,
  RecordingNotifier,
  InMemoryReportStore,
  steppingClock,
  type QuantityWrite,
  type StaticSupplierOptions,
} from "./fakes.js";
export { createMockLogger, type MockLogger, type LogCall } from "../logging/testing.js";

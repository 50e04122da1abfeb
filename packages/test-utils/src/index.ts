/**
 * @objwire/test-utils
 *
 * In-process engine stand-in and polling helpers for tests.
 */

export {
  startMockEngine,
  defaultReplies,
  MOCK_ENUMS,
  MOCK_VERSION,
  PNG_SIGNATURE,
  GLB_HEADER,
  type MockEngine,
  type MockEngineOptions,
  type ExecuteHandler,
  type RecordedRequest,
} from "./mock-engine.ts";

export { waitFor, tempSocketPath } from "./wait.ts";

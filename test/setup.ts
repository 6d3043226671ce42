/**
 * Global test setup: silences the logger and routes HTTP through the mock
 * channel server.
 */

import { afterAll, afterEach, beforeAll, vi } from "vitest";
import { server } from "./mock-server";

vi.mock("../src/utils/logger");

beforeAll(() => {
  server.listen({ onUnhandledRequest: "error" });
});

// Reset handlers after each test to ensure test isolation
afterEach(() => {
  server.resetHandlers();
});

afterAll(() => {
  server.close();
});

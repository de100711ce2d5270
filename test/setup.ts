// test/setup.ts
// Restore spies between tests
import { afterEach, vi } from "vitest"

afterEach(() => {
  vi.restoreAllMocks()
})

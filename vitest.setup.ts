import { afterEach, vi } from "vitest"

// Pipeline progress goes to console.log; keep test output readable
vi.spyOn(console, "log").mockImplementation(() => {})

// Every test starts from the real environment
afterEach(() => {
  vi.unstubAllEnvs()
})

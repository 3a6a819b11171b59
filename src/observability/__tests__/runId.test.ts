import { describe, expect, it } from "vitest";
import { createRunId } from "../runId";

describe("createRunId", () => {
  const start = new Date(Date.UTC(2024, 0, 2, 3, 4, 5, 678));

  it("prefixes the id with the command and its start time", () => {
    expect(createRunId("discover", start)).toMatch(/^discover_2024-01-02T03-04-05-678Z_[a-z0-9]{1,6}$/);
  });

  it("uses run when no command is given", () => {
    expect(createRunId()).toMatch(/^run_\d{4}-\d{2}-\d{2}T\d{2}-\d{2}-\d{2}-\d{3}Z_[a-z0-9]{1,6}$/);
  });
});

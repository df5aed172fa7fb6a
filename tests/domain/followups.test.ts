import { describe, expect, it } from "vitest";

import { isOverdue, resolveDueDate } from "@/lib/domain/followups";

// A Wednesday afternoon.
const reference = new Date("2025-03-12T15:30:00.000Z");

describe("resolveDueDate", () => {
  it("prefers an explicit due date", () => {
    expect(resolveDueDate({ dueDate: "2025-04-01", dueText: "tomorrow" }, reference)).toBe("2025-04-01");
  });

  it("ignores an invalid explicit date and reads the phrase", () => {
    expect(resolveDueDate({ dueDate: "2025-02-30", dueText: "tomorrow" }, reference)).toBe("2025-03-13");
  });

  it.each([
    ["6 months", "2025-09-12"],
    ["in two weeks", "2025-03-26"],
    ["3 days", "2025-03-15"],
    ["a year", "2026-03-12"],
    ["tomorrow", "2025-03-13"],
    ["today", "2025-03-12"],
    ["next week", "2025-03-19"],
    ["next month", "2025-04-12"],
    ["friday", "2025-03-14"],
    ["on Monday", "2025-03-17"],
    ["wednesday", "2025-03-19"],
    ["by 2025-05-02 at the latest", "2025-05-02"],
  ])("resolves %j", (dueText, expected) => {
    expect(resolveDueDate({ dueText }, reference)).toBe(expected);
  });

  it("defaults to one month out", () => {
    expect(resolveDueDate({}, reference)).toBe("2025-04-12");
    expect(resolveDueDate({ dueText: "sometime soon" }, reference)).toBe("2025-04-12");
  });

  it("clamps month arithmetic to the end of the month", () => {
    expect(resolveDueDate({ dueText: "1 month" }, new Date("2025-01-31T10:00:00.000Z"))).toBe("2025-02-28");
  });
});

describe("isOverdue", () => {
  it("only counts days that have fully passed", () => {
    expect(isOverdue("2025-03-11", reference)).toBe(true);
    expect(isOverdue("2025-03-12", reference)).toBe(false);
    expect(isOverdue("2025-03-13", reference)).toBe(false);
  });
});

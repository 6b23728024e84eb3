import { describe, it, expect } from "vitest";
import {
  displayName,
  formatRunTimestamp,
  isRunState,
  parseRunTimestamp,
  slugifyFieldLabel,
  snapshotRunState,
  toAttendeeRecord,
} from "../src/index.js";

describe("toAttendeeRecord", () => {
  it("fills absent fields with empty strings", () => {
    expect(toAttendeeRecord({ id: "p1", firstName: "Grace" })).toEqual({
      id: "p1",
      firstName: "Grace",
      lastName: "",
      jobTitle: "",
      organization: "",
      photoUrl: "",
      biography: "",
      userId: "",
    });
  });

  it("ignores extra upstream fields", () => {
    const record = toAttendeeRecord({ id: "p2", __typename: "Person", lastName: "Hopper" });
    expect(record).not.toHaveProperty("__typename");
    expect(record?.lastName).toBe("Hopper");
  });

  it("rejects nodes without a string id", () => {
    expect(toAttendeeRecord({ firstName: "Nobody" })).toBeNull();
    expect(toAttendeeRecord({ id: 42 })).toBeNull();
    expect(toAttendeeRecord({ id: "" })).toBeNull();
    expect(toAttendeeRecord(null)).toBeNull();
    expect(toAttendeeRecord(["p3"])).toBeNull();
  });
});

describe("slugifyFieldLabel", () => {
  it("lowercases and joins words with underscores", () => {
    expect(slugifyFieldLabel("AI Maturity")).toBe("ai_maturity");
    expect(slugifyFieldLabel("  Province / State ")).toBe("province_state");
    expect(slugifyFieldLabel("Région")).toBe("region");
  });
});

describe("displayName", () => {
  it("falls back to the id", () => {
    const base = { id: "p9", firstName: "", lastName: "", jobTitle: "", organization: "", photoUrl: "", biography: "", userId: "" };
    expect(displayName(base)).toBe("p9");
    expect(displayName({ ...base, firstName: "Alan" })).toBe("Alan");
  });
});

describe("run timestamps", () => {
  it("formats local time as a run directory name", () => {
    expect(formatRunTimestamp(new Date(2025, 8, 10, 7, 5, 3))).toBe("2025-09-10_070503");
  });

  it("parses names it produced and rejects anything else", () => {
    const date = parseRunTimestamp("2025-09-10_070503");
    expect(date?.getTime()).toBe(new Date(2025, 8, 10, 7, 5, 3).getTime());
    expect(parseRunTimestamp("latest")).toBeNull();
    expect(parseRunTimestamp("2025-13-10_070503")).toBeNull();
  });
});

describe("snapshotRunState", () => {
  it("copies records and seen ids", () => {
    const records = [{ id: "a", firstName: "", lastName: "", jobTitle: "", organization: "", photoUrl: "", biography: "", userId: "" }];
    const seen = new Set(["a"]);
    const state = snapshotRunState(records, seen, 10, 3, new Date("2025-01-01T00:00:00.000Z"));

    records.push({ ...records[0], id: "b" });
    seen.add("b");

    expect(state.records).toHaveLength(1);
    expect(state.seenIds).toEqual(["a"]);
    expect(state.timestamp).toBe("2025-01-01T00:00:00.000Z");
    expect(isRunState(state)).toBe(true);
    expect(isRunState({ records: [] })).toBe(false);
  });
});

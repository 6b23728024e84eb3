import { describe, it, expect } from "vitest";
import {
  attendeesToCsv,
  detailedColumns,
  escapeCsvField,
  flattenDetailedAttendee,
  organizeRows,
  toCsv,
  type AttendeeRecord,
  type DetailedAttendee,
} from "../src/index.js";

const ada: AttendeeRecord = {
  id: "p1",
  firstName: "Ada",
  lastName: "Lovelace",
  jobTitle: "Analyst",
  organization: "Engines, Ltd",
  photoUrl: "",
  biography: 'Wrote the "first" program',
  userId: "u1",
};

describe("escapeCsvField", () => {
  it("leaves plain values alone", () => {
    expect(escapeCsvField("plain value")).toBe("plain value");
  });

  it("quotes commas, quotes and line breaks", () => {
    expect(escapeCsvField("a,b")).toBe('"a,b"');
    expect(escapeCsvField('say "hi"')).toBe('"say ""hi"""');
    expect(escapeCsvField("line\nbreak")).toBe('"line\nbreak"');
  });
});

describe("toCsv", () => {
  it("writes the header and fills missing values with empty fields", () => {
    const csv = toCsv([{ a: "1" }, { b: "2" }], ["a", "b"]);
    expect(csv).toBe("a,b\r\n1,\r\n,2\r\n");
  });
});

describe("attendeesToCsv", () => {
  it("uses the attendee field order as header", () => {
    const lines = attendeesToCsv([ada]).split("\r\n");
    expect(lines[0]).toBe("id,firstName,lastName,jobTitle,organization,photoUrl,biography,userId");
    expect(lines[1]).toBe('p1,Ada,Lovelace,Analyst,"Engines, Ltd",,"Wrote the ""first"" program",u1');
    expect(lines[2]).toBe("");
  });
});

describe("detailed rows", () => {
  const detailed: DetailedAttendee = {
    ...ada,
    email: "ada@example.com",
    mobilePhone: "",
    landlinePhone: "",
    websiteUrl: "https://example.com",
    fields: { country: "United Kingdom", favourite_colour: "green" },
    socials: { linkedin: "https://linkedin.example/ada" },
  };

  it("flattens profile fields and socials into prefixed columns", () => {
    const row = flattenDetailedAttendee(detailed);
    expect(row.detail_country).toBe("United Kingdom");
    expect(row.social_linkedin).toBe("https://linkedin.example/ada");
    expect(row.email).toBe("ada@example.com");
    expect(row.id).toBe("p1");
  });

  it("collects a sorted union of columns", () => {
    const columns = detailedColumns([{ b: "1", a: "2" }, { c: "3", a: "4" }]);
    expect(columns).toEqual(["a", "b", "c"]);
  });

  it("relabels known columns first and keeps the rest", () => {
    const { columns, rows } = organizeRows([flattenDetailedAttendee(detailed)]);
    expect(columns).toEqual([
      "First Name",
      "Last Name",
      "Job Title",
      "Organization",
      "Country",
      "Email",
      "Mobile Phone",
      "Landline Phone",
      "Website",
      "Biography",
      "Attendee ID",
      "detail_favourite_colour",
      "photoUrl",
      "social_linkedin",
      "userId",
    ]);
    expect(rows[0]["Country"]).toBe("United Kingdom");
    expect(rows[0]["Attendee ID"]).toBe("p1");
    expect(rows[0].detail_favourite_colour).toBe("green");
  });
});

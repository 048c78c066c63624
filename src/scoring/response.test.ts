import { describe, it, expect } from "vitest";
import { compareInfo, extractInfo, extractStatus } from "./response.js";

describe("extractInfo", () => {
  it("extracts numbers, percentages and amounts", () => {
    const info = extractInfo("The penalty is $1,250.50 at 5% interest for 15 days.");
    expect(info).toEqual({
      numbers: [1250.5, 5, 15],
      percentages: [5],
      amounts: [1250.5],
      status: null,
      warnings: [],
    });
  });

  it("takes warnings from tool responses when there are any", () => {
    const info = extractInfo("A warning was shown.", { toolResponses: [{ status: "ok" }] });
    expect(info.warnings).toEqual([]);

    const withWarning = extractInfo("done", { toolResponses: [{ warnings: ["Close to limit"] }] });
    expect(withWarning.warnings).toEqual(["Close to limit"]);
  });

  it("falls back to warning sentences in the text", () => {
    expect(extractInfo("Approved. Warning: verify income.").warnings).toEqual([
      "Warning: verify income.",
    ]);
  });
});

describe("extractStatus", () => {
  it("canonicalizes verb forms", () => {
    expect(extractStatus("Your application was Approved.")).toBe("PASSED");
    expect(extractStatus("The check passes")).toBe("PASSED");
    expect(extractStatus("unsuccessful attempt")).toBe("FAILED");
  });

  it("keeps labels without a mapping", () => {
    expect(extractStatus("Applicant is not eligible.")).toBe("NOT ELIGIBLE");
  });

  it("lets earlier patterns win", () => {
    expect(extractStatus("The form is valid but the transfer was rejected")).toBe("FAILED");
  });

  it("applies custom mappings with upper-cased keys", () => {
    expect(extractStatus("You are eligible", { eligible: "PASSED" })).toBe("PASSED");
  });

  it("returns null when nothing matches", () => {
    expect(extractStatus("Nothing to report")).toBeNull();
  });
});

describe("compareInfo", () => {
  it("scores matching status and amount as 1.0", () => {
    const result = compareInfo(
      extractInfo("Penalty: $150.00. Status: PASSED"),
      extractInfo("The penalty is $150. PASS")
    );
    expect(result).toEqual({
      score: 1,
      reason: "Status matches; Main amount accuracy: 1.00; Warning presence matches",
    });
  });

  it("scores the primary amount by relative error", () => {
    const result = compareInfo(extractInfo("Total $200"), extractInfo("Total $150"));
    expect(result.score).toBeCloseTo(0.875);
    expect(result.reason).toBe("Main amount accuracy: 0.75; Warning presence matches");
  });

  it("reports a missing status", () => {
    const result = compareInfo(extractInfo("PASSED"), extractInfo("ok"));
    expect(result).toEqual({
      score: 0.5,
      reason: "Missing status: expected PASSED; Warning presence matches",
    });
  });

  it("reports a status mismatch", () => {
    const result = compareInfo(extractInfo("PASSED"), extractInfo("FAILED"));
    expect(result.reason).toBe("Status mismatch: expected PASSED, got FAILED; Warning presence matches");
    expect(result.score).toBe(0.5);
  });

  it("counts expected percentages found within 0.1", () => {
    const result = compareInfo(extractInfo("Rate 5% and 7.5%"), extractInfo("Rate 5.05%"));
    expect(result.score).toBeCloseTo(0.75);
    expect(result.reason).toBe("Percentage accuracy: 0.50; Warning presence matches");
  });

  it("gives half credit when warning presence differs", () => {
    const result = compareInfo(extractInfo("Warning: late."), extractInfo("All fine."));
    expect(result).toEqual({ score: 0.5, reason: "Warning presence mismatch" });
  });
});

import { describe, it, expect } from "vitest";
import { interpolate, interpolateValue } from "./interpolate.js";

describe("interpolate", () => {
  it("replaces ${ENV.NAME} with the variable value", () => {
    const result = interpolate("Bearer ${ENV.TOKEN}", { TOKEN: "test-secret" });
    expect(result).toBe("Bearer test-secret");
  });

  it("replaces multiple variables", () => {
    const result = interpolate("${ENV.HOST}:${ENV.PORT}", { HOST: "localhost", PORT: "8000" });
    expect(result).toBe("localhost:8000");
  });

  it("leaves unknown variables as empty string", () => {
    const result = interpolate("Hello ${ENV.UNKNOWN}!", {});
    expect(result).toBe("Hello !");
  });

  it("uses the default when the variable is unset or empty", () => {
    expect(interpolate("${ENV.PORT:-8000}", {})).toBe("8000");
    expect(interpolate("${ENV.PORT:-8000}", { PORT: "" })).toBe("8000");
    expect(interpolate("${ENV.PORT:-8000}", { PORT: "9000" })).toBe("9000");
  });

  it("does not touch placeholders without the ENV prefix", () => {
    expect(interpolate("${NAME}", { NAME: "x" })).toBe("${NAME}");
  });

  it("reads process.env by default", () => {
    process.env.TOOLEVAL_TEST_VAR = "test-value";
    const result = interpolate("Value: ${ENV.TOOLEVAL_TEST_VAR}");
    expect(result).toBe("Value: test-value");
    delete process.env.TOOLEVAL_TEST_VAR;
  });
});

describe("interpolateValue", () => {
  it("interpolates string values in objects", () => {
    const result = interpolateValue(
      { greeting: "Hello ${ENV.NAME}", count: 42 },
      { NAME: "World" }
    );
    expect(result).toEqual({ greeting: "Hello World", count: 42 });
  });

  it("interpolates nested objects", () => {
    const result = interpolateValue(
      { target: { headers: { Authorization: "Bearer ${ENV.TOKEN}" } } },
      { TOKEN: "test-secret" }
    );
    expect(result).toEqual({ target: { headers: { Authorization: "Bearer test-secret" } } });
  });

  it("preserves arrays and interpolates string elements", () => {
    const result = interpolateValue(
      { tools: ["${ENV.A}", "${ENV.B}", "literal"] },
      { A: "first", B: "second" }
    );
    expect(result).toEqual({ tools: ["first", "second", "literal"] });
  });

  it("returns primitives unchanged", () => {
    expect(interpolateValue(3, {})).toBe(3);
    expect(interpolateValue(null, {})).toBeNull();
    expect(interpolateValue(true, {})).toBe(true);
  });
});

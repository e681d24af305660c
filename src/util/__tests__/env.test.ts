import {
  getEnvVar,
  getList,
  getNumber,
  getStage,
  getString,
  isLocal,
} from "../../util/env";

describe("env utils", () => {
  const originalEnv = process.env;
  beforeEach(() => {
    process.env = { ...originalEnv };
  });
  afterAll(() => {
    process.env = originalEnv;
  });

  test("stage resolution with STAGE", () => {
    process.env.STAGE = "prod";
    expect(getStage()).toBe("prod");
  });

  test("stage fallback to NODE_ENV", () => {
    delete process.env.STAGE;
    process.env.NODE_ENV = "production";
    expect(getStage()).toBe("prod");
  });

  test("isLocal detects absence of lambda env", () => {
    delete process.env.AWS_LAMBDA_FUNCTION_NAME;
    delete process.env.AWS_EXECUTION_ENV;
    expect(isLocal()).toBe(true);
  });

  test("getEnvVar returns default when missing", () => {
    const value = getEnvVar("UNKNOWN_VAR", {
      defaultValue: "abc",
      parse: (raw) => raw,
    });
    expect(value).toBe("abc");
  });

  test("getEnvVar throws for a missing required var", () => {
    process.env.STAGE = "dev";
    expect(() =>
      getEnvVar("REQUIRED_VAR", { required: true, parse: (raw) => raw })
    ).toThrow("Missing required env var: REQUIRED_VAR__dev or REQUIRED_VAR");
  });

  test("getEnvVar stageAware picks staged value first", () => {
    process.env.STAGE = "dev";
    process.env.MY_KEY__dev = "staged";
    process.env.MY_KEY = "plain";
    expect(getString("MY_KEY")).toBe("staged");
  });

  test("number parser", () => {
    process.env.NUMBER_KEY = "42";
    expect(getNumber("NUMBER_KEY")).toBe(42);
  });

  test("number parser rejects garbage", () => {
    process.env.NUMBER_KEY = "forty";
    expect(() => getNumber("NUMBER_KEY", 1)).toThrow(
      "Env var NUMBER_KEY is not a number: forty"
    );
  });

  test("getString returns default", () => {
    expect(getString("NOPE", "x")).toBe("x");
  });

  test("getList splits on commas and drops blanks", () => {
    process.env.LIST_KEY = " .NS, ,.BO ";
    expect(getList("LIST_KEY", [])).toEqual([".NS", ".BO"]);
    expect(getList("MISSING_LIST", ["a"])).toEqual(["a"]);
  });
});

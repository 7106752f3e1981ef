import { describe, expect, it } from "vitest";
import { z } from "zod";
import {
  extractJson,
  findBalancedBlock,
  stripCodeFence,
  tolerantParse,
} from "./tolerantParse";

describe("extractJson", () => {
  it("parses plain JSON", () => {
    expect(extractJson('{"score": 80}')._unsafeUnwrap()).toEqual({ score: 80 });
  });

  it("parses the body of a fenced block", () => {
    const text = 'Here you go:\n```json\n{"platform": "linux"}\n```\nDone.';
    expect(extractJson(text)._unsafeUnwrap()).toEqual({ platform: "linux" });
  });

  it("finds the first balanced object inside prose", () => {
    const text = 'Sure! {"observables": [{"value": "a}b"}]} hope that helps';
    expect(extractJson(text)._unsafeUnwrap()).toEqual({
      observables: [{ value: "a}b" }],
    });
  });

  it("drops trailing commas", () => {
    expect(extractJson('{"rules": [1, 2,],}')._unsafeUnwrap()).toEqual({
      rules: [1, 2],
    });
  });

  it("reports empty text", () => {
    expect(extractJson("   \n")._unsafeUnwrapErr()).toEqual({
      stage: "empty",
      message: "Response was empty.",
      excerpt: "",
    });
  });

  it("reports text with no JSON as a json-stage error", () => {
    const error = extractJson("I cannot help with that.")._unsafeUnwrapErr();
    expect(error.stage).toBe("json");
    expect(error.excerpt).toBe("I cannot help with that.");
  });
});

describe("tolerantParse", () => {
  const schema = z.object({ score: z.number() });

  it("validates the recovered value", () => {
    expect(tolerantParse('```\n{"score": 7}\n```', schema)._unsafeUnwrap()).toEqual({
      score: 7,
    });
  });

  it("reports schema mismatches with their path", () => {
    const error = tolerantParse('{"score": "high"}', schema)._unsafeUnwrapErr();
    expect(error.stage).toBe("schema");
    expect(error.message).toBe("score: Expected number, received string");
  });
});

describe("helpers", () => {
  it("leaves unfenced text untouched", () => {
    expect(stripCodeFence('{"a": 1}')).toBe('{"a": 1}');
  });

  it("returns null when brackets never balance", () => {
    expect(findBalancedBlock('{"a": [1, 2}')).toBeNull();
  });
});

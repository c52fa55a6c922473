import { describe, expect, it } from "vitest";
import { cosDeg, isTangentPole, normalizeDegrees, sinDeg, tanDeg } from "../index.js";

describe("normalizeDegrees", () => {
  it("reduces angles into [0, 360)", () => {
    expect(normalizeDegrees(-30)).toBe(330);
    expect(normalizeDegrees(720)).toBe(0);
    expect(normalizeDegrees(-360)).toBe(0);
    expect(normalizeDegrees(405)).toBe(45);
  });
});

describe("degree trigonometry", () => {
  it("is exact on the quarter turns", () => {
    expect(sinDeg(90)).toBe(1);
    expect(sinDeg(180)).toBe(0);
    expect(sinDeg(-90)).toBe(-1);
    expect(cosDeg(90)).toBe(0);
    expect(cosDeg(-180)).toBe(-1);
    expect(cosDeg(450)).toBe(0);
  });

  it("matches Math between the quarter turns", () => {
    expect(sinDeg(30)).toBeCloseTo(0.5, 12);
    expect(cosDeg(60)).toBeCloseTo(0.5, 12);
    expect(tanDeg(45)).toBeCloseTo(1, 12);
  });

  it("reports the tangent poles", () => {
    expect(isTangentPole(90)).toBe(true);
    expect(isTangentPole(-90)).toBe(true);
    expect(isTangentPole(450)).toBe(true);
    expect(isTangentPole(180)).toBe(false);
    expect(tanDeg(270)).toBe(Infinity);
    expect(tanDeg(180)).toBe(0);
  });
});

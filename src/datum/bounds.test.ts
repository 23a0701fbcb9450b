import { describe, it, expect } from "vitest";
import { CHINA_BOUNDS, sanityInChina } from "./bounds";

describe("sanityInChina", () => {
  it("accepts points in mainland China", () => {
    expect(sanityInChina({ lat: 39.9042, lon: 116.4074 })).toBe(true);
    expect(sanityInChina({ lat: 31.2304, lon: 121.4737 })).toBe(true);
  });

  it("cuts off just above the equator", () => {
    expect(sanityInChina({ lat: 1, lon: 110 })).toBe(true);
    expect(sanityInChina({ lat: 0.5, lon: 110 })).toBe(false);
  });

  it("includes the rectangle edges", () => {
    expect(sanityInChina({ lat: CHINA_BOUNDS.minLat, lon: CHINA_BOUNDS.minLon })).toBe(true);
    expect(sanityInChina({ lat: CHINA_BOUNDS.maxLat, lon: CHINA_BOUNDS.maxLon })).toBe(true);
  });

  it("rejects points just outside an edge", () => {
    expect(sanityInChina({ lat: 0.8292, lon: 100 })).toBe(false);
    expect(sanityInChina({ lat: 55.8272, lon: 100 })).toBe(false);
    expect(sanityInChina({ lat: 30, lon: 72.0039 })).toBe(false);
    expect(sanityInChina({ lat: 30, lon: 137.8348 })).toBe(false);
  });

  it("rejects points elsewhere", () => {
    expect(sanityInChina({ lat: 40.7128, lon: -74.006 })).toBe(false);
    expect(sanityInChina({ lat: 0, lon: 0 })).toBe(false);
  });
});

/**
 * Datum Transform Tests
 */

import { describe, it, expect } from "vitest";
import { distance } from "./distance";
import {
  bdToGcj,
  bdToGcjPrecise,
  bdToWgs,
  bdToWgsPrecise,
  convert,
  gcjToBd,
  gcjToWgs,
  gcjToWgsPrecise,
  wgsToBd,
  wgsToGcj,
} from "./transform";
import { bd09, gcj02, wgs84 } from "./types";

const BEIJING = wgs84(39.9042, 116.4074);
const SHANGHAI = wgs84(31.2304, 121.4737);
const NEW_YORK = wgs84(40.7128, -74.006);

describe("wgsToGcj", () => {
  it("shifts Beijing by a few hundred meters", () => {
    const gcj = wgsToGcj(BEIJING);
    expect(gcj.lat).toBeCloseTo(39.90560334, 8);
    expect(gcj.lon).toBeCloseTo(116.41364225, 8);
  });

  it("lands near the published GCJ-02 position of Beijing", () => {
    const gcj = wgsToGcj(BEIJING);
    expect(Math.abs(gcj.lat - 39.91)).toBeLessThan(0.01);
    expect(Math.abs(gcj.lon - 116.4135)).toBeLessThan(0.01);
  });

  it("shifts Shanghai", () => {
    const gcj = wgsToGcj(SHANGHAI);
    expect(gcj.lat).toBeCloseTo(31.22845774, 8);
    expect(gcj.lon).toBeCloseTo(121.47822306, 8);
  });

  it("leaves points outside China unchanged", () => {
    expect(wgsToGcj(NEW_YORK)).toEqual({ lat: 40.7128, lon: -74.006 });
  });

  it("shifts points outside China when the check is disabled", () => {
    const forced = wgsToGcj(NEW_YORK, false);
    expect(forced.lat).not.toBe(NEW_YORK.lat);
    expect(forced.lon).not.toBe(NEW_YORK.lon);
  });
});

describe("gcjToWgs", () => {
  it("applies a single correction step", () => {
    const wgs = gcjToWgs(gcj02(39.91, 116.4135));
    expect(wgs.lat).toBeCloseTo(39.90859854, 8);
    expect(wgs.lon).toBeCloseTo(116.4072602, 7);
  });

  it("round-trips to within about a meter", () => {
    const back = gcjToWgs(wgsToGcj(BEIJING));
    expect(distance(back, BEIJING)).toBeLessThan(1);
  });

  it("leaves points outside China unchanged", () => {
    expect(gcjToWgs(gcj02(40.7128, -74.006))).toEqual({ lat: 40.7128, lon: -74.006 });
  });
});

describe("gcjToBd / bdToGcj", () => {
  it("converts GCJ-02 to BD-09", () => {
    const bd = gcjToBd(gcj02(39.91, 116.4135));
    expect(bd.lat).toBeCloseTo(39.91626232, 8);
    expect(bd.lon).toBeCloseTo(116.4198995, 7);
  });

  it("converts BD-09 to GCJ-02", () => {
    const gcj = bdToGcj(bd09(39.9165, 116.42));
    expect(gcj.lat).toBeCloseTo(39.91023782, 8);
    expect(gcj.lon).toBeCloseTo(116.41360093, 8);
  });

  it("applies outside China too", () => {
    const bd = gcjToBd(gcj02(40.7128, -74.006));
    expect(bd.lat).not.toBe(40.7128);
  });

  it("round-trips closely", () => {
    const back = bdToGcj(gcjToBd(gcj02(39.91, 116.4135)));
    expect(back.lat).toBeCloseTo(39.91, 5);
    expect(back.lon).toBeCloseTo(116.4135, 5);
  });
});

describe("composite conversions", () => {
  it("wgsToBd goes through GCJ-02", () => {
    const bd = wgsToBd(BEIJING);
    expect(bd).toEqual(gcjToBd(wgsToGcj(BEIJING)));
    expect(bd.lat).toBeCloseTo(39.91186534, 8);
    expect(bd.lon).toBeCloseTo(116.42004633, 8);
  });

  it("bdToWgs goes through GCJ-02", () => {
    const bd = bd09(39.9165, 116.42);
    expect(bdToWgs(bd)).toEqual(gcjToWgs(bdToGcj(bd)));
  });
});

describe("precise inverses", () => {
  it("gcjToWgsPrecise recovers the WGS-84 point", () => {
    const back = gcjToWgsPrecise(wgsToGcj(BEIJING));
    expect(Math.abs(back.lat - BEIJING.lat)).toBeLessThan(1e-5);
    expect(Math.abs(back.lon - BEIJING.lon)).toBeLessThan(1e-5);
  });

  it("is never less accurate than the approximate inverse", () => {
    for (const wgs of [BEIJING, SHANGHAI, wgs84(22.5431, 114.0579)]) {
      const gcj = wgsToGcj(wgs);
      const precise = distance(gcjToWgsPrecise(gcj), wgs);
      const approx = distance(gcjToWgs(gcj), wgs);
      expect(precise).toBeLessThanOrEqual(approx);
    }
  });

  it("bdToGcjPrecise recovers the GCJ-02 point", () => {
    const gcj = gcj02(39.91, 116.4135);
    const back = bdToGcjPrecise(gcjToBd(gcj));
    expect(back.lat).toBeCloseTo(gcj.lat, 5);
    expect(back.lon).toBeCloseTo(gcj.lon, 5);
  });

  it("bdToWgsPrecise recovers the WGS-84 point", () => {
    const back = bdToWgsPrecise(wgsToBd(BEIJING));
    expect(back.lat).toBeCloseTo(BEIJING.lat, 4);
    expect(back.lon).toBeCloseTo(BEIJING.lon, 4);
  });

  it("honors checkChina outside China", () => {
    const forced = wgsToGcj(NEW_YORK, false);
    const back = gcjToWgsPrecise(forced, false);
    expect(back.lat).toBeCloseTo(NEW_YORK.lat, 4);
    expect(back.lon).toBeCloseTo(NEW_YORK.lon, 4);

    expect(gcjToWgsPrecise(gcj02(40.7128, -74.006))).toEqual({
      lat: 40.7128,
      lon: -74.006,
    });
  });
});

describe("convert", () => {
  it("copies the point when the datums match", () => {
    const p = { lat: 39.9042, lon: 116.4074 };
    const result = convert("WGS84", "WGS84", p);
    expect(result).toEqual(p);
    expect(result).not.toBe(p);
  });

  it("dispatches to the typed conversions", () => {
    const p = { lat: 39.9042, lon: 116.4074 };
    expect(convert("WGS84", "GCJ02", p)).toEqual(wgsToGcj(BEIJING));
    expect(convert("WGS84", "BD09", p)).toEqual(wgsToBd(BEIJING));
    expect(convert("GCJ02", "BD09", p)).toEqual(gcjToBd(gcj02(p.lat, p.lon)));
    expect(convert("GCJ02", "WGS84", p)).toEqual(gcjToWgs(gcj02(p.lat, p.lon)));
    expect(convert("BD09", "GCJ02", p)).toEqual(bdToGcj(bd09(p.lat, p.lon)));
    expect(convert("BD09", "WGS84", p)).toEqual(bdToWgs(bd09(p.lat, p.lon)));
  });

  it("uses the iterative inverses when precise", () => {
    const p = { lat: 39.9165, lon: 116.42 };
    const options = { precise: true };
    expect(convert("GCJ02", "WGS84", p, options)).toEqual(
      gcjToWgsPrecise(gcj02(p.lat, p.lon))
    );
    expect(convert("BD09", "GCJ02", p, options)).toEqual(
      bdToGcjPrecise(bd09(p.lat, p.lon))
    );
    expect(convert("BD09", "WGS84", p, options)).toEqual(
      bdToWgsPrecise(bd09(p.lat, p.lon))
    );
  });

  it("passes checkChina through", () => {
    const p = { lat: 40.7128, lon: -74.006 };
    expect(convert("WGS84", "GCJ02", p, { checkChina: false })).toEqual(
      wgsToGcj(NEW_YORK, false)
    );
    expect(convert("WGS84", "GCJ02", p)).toEqual(p);
  });
});

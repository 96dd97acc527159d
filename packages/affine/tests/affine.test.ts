import { describe, expect, it } from "vitest";
import type { Affine } from "../src/affine.js";
import {
  affine,
  almostEqual,
  apply,
  convert,
  distance,
  format,
  fromArray,
  identity,
  precisionOf,
  rotation,
  scale,
  toArray,
  translation,
} from "../src/affine.js";
import { A, B, C, VECTORS } from "./helpers.js";

describe("affine", () => {
  it("stores coefficients in geotransform order", () => {
    const t = affine(1, 2, 3, 4, 5, 6);
    expect(toArray(t)).toEqual([1, 2, 3, 4, 5, 6]);
    expect(t.precision).toBe("float64");
  });

  it("rounds coefficients to the requested precision", () => {
    const t = affine(0.1, 0, 0, 0, 0.1, 0, "float32");
    expect(t.xx).toBe(Math.fround(0.1));
    expect(t.yy).toBe(Math.fround(0.1));
    expect(precisionOf(t)).toBe("float32");
  });

  it("is frozen", () => {
    expect(Object.isFrozen(A)).toBe(true);
  });
});

describe("identity", () => {
  it("maps every point to itself", () => {
    for (const v of VECTORS) {
      expect(apply(identity(), v)).toEqual(v);
    }
  });

  it("takes a precision", () => {
    expect(identity("float16").precision).toBe("float16");
    expect(identity().precision).toBe("float64");
  });
});

describe("apply", () => {
  it("applies an identity-like transform", () => {
    const gt: Affine = affine(1, 0, 0, 0, 1, 0);
    expect(apply(gt, 3, 4)).toEqual([3, 4]);
  });

  it("applies translation", () => {
    const gt: Affine = affine(1, 0, 10, 0, 1, 20);
    expect(apply(gt, 5, 5)).toEqual([15, 25]);
  });

  it("applies scale + translation", () => {
    const gt: Affine = affine(0.5, 0, 100, 0, -0.5, 200);
    expect(apply(gt, 10, 20)).toEqual([105, 190]);
  });

  it("maps the origin to the translation part", () => {
    expect(apply(A, 0, 0)).toEqual([-3, 2]);
  });

  it("accepts a point tuple", () => {
    for (const t of [A, B, C]) {
      for (const v of VECTORS) {
        expect(apply(t, v)).toEqual(apply(t, v[0], v[1]));
      }
    }
  });

  it("computes in the transform's precision", () => {
    const a32 = convert(A, "float32");
    expect(apply(a32, 1, 1)).toEqual([-2, Math.fround(Math.fround(0.1) + 3)]);
  });

  it("rounds the input point to the transform's precision", () => {
    const stretchX = affine(3, 0, 0, 0, 1, 0, "float32");
    const stretchY = affine(1, 0, 0, 0, 3, 0, "float32");
    const expected = Math.fround(3 * Math.fround(1 / 97));
    expect(apply(stretchX, 1 / 97, 0)[0]).toBe(expected);
    expect(apply(stretchY, [0, 1 / 97])[1]).toBe(expected);
  });

  it("propagates NaN and infinities", () => {
    const [x, y] = apply(A, NaN, 0);
    expect(x).toBeNaN();
    expect(y).toBeNaN();
    expect(apply(translation(1, 1), Infinity, 0)[0]).toBe(Infinity);
  });
});

describe("convert", () => {
  it("is a no-op for the same precision", () => {
    expect(convert(A, "float64")).toBe(A);
  });

  it("casts every coefficient", () => {
    const b16 = convert(B, "float16");
    expect(b16.precision).toBe("float16");
    expect(b16.xy).toBe(0.0999755859375);
    expect(b16.xx).not.toBe(B.xx);
  });

  it("widens without changing values", () => {
    const b32 = convert(B, "float32");
    const back = convert(b32, "float64");
    expect(back.precision).toBe("float64");
    expect(toArray(back)).toEqual(toArray(b32));
  });
});

describe("builders", () => {
  it("translation moves points", () => {
    expect(apply(translation(10, 20), 1, 2)).toEqual([11, 22]);
  });

  it("scale defaults to uniform scaling", () => {
    expect(scale(3)).toEqual(affine(3, 0, 0, 0, 3, 0));
    expect(apply(scale(2, 3), 5, 10)).toEqual([10, 30]);
  });

  it("rotation turns counter-clockwise", () => {
    const [x, y] = apply(rotation(Math.PI / 2), 1, 0);
    expect(x).toBeCloseTo(0, 15);
    expect(y).toBe(1);
  });
});

describe("fromArray / toArray", () => {
  it("reads geotransform arrays", () => {
    const t = fromArray([0.5, 0, 100, 0, -0.5, 200]);
    expect(apply(t, 10, 20)).toEqual([105, 190]);
    expect(fromArray(toArray(C))).toEqual(C);
  });

  it("takes a precision", () => {
    expect(fromArray([1, 0, 0, 0, 1, 0], "float32")).toEqual(
      identity("float32"),
    );
  });

  it("rejects arrays of the wrong length", () => {
    expect(() => fromArray([1, 2, 3])).toThrow(RangeError);
    expect(() => fromArray([1, 2, 3])).toThrow(/Expected 6 coefficients/);
  });
});

describe("distance", () => {
  it("is the largest coefficient difference", () => {
    expect(distance(translation(1, 2), translation(1, 5))).toBe(3);
    expect(distance(C, C)).toBe(0);
  });

  it("backs almostEqual", () => {
    expect(almostEqual(translation(1, 2), translation(1, 2 + 1e-15))).toBe(
      true,
    );
    expect(almostEqual(translation(1, 2), translation(1, 2.1))).toBe(false);
    expect(almostEqual(translation(1, 2), translation(1, 2.1), 0.2)).toBe(true);
  });
});

describe("format", () => {
  it("shows the precision and all six coefficients", () => {
    expect(format(A)).toBe("Affine<float64>(1,0,-3,  0.1,1,2)");
    expect(format(identity("float32"))).toBe(
      "Affine<float32>(1,0,0,  0,1,0)",
    );
  });
});

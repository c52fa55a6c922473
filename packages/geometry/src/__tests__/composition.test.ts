import { describe, expect, it } from "vitest";
import { InvalidArgumentError } from "@branchwork/core";
import {
  applyToPoint,
  approxEqual,
  chain,
  compose,
  fromRows,
  identity,
  isAffine,
  linearPart,
  multiply,
  rotate,
  rotateX,
  rotateY,
  rotateZ,
  scale,
  toRows,
  translate,
  type Mat3,
} from "../index.js";

const EPSILON = 10;

function timesTranspose(r: Mat3): number[] {
  const out: number[] = [];
  for (let row = 0; row < 3; row++) {
    for (let col = 0; col < 3; col++) {
      let sum = 0;
      for (let k = 0; k < 3; k++) {
        sum += r[row * 3 + k] * r[col * 3 + k];
      }
      out.push(sum);
    }
  }
  return out;
}

describe("identity law", () => {
  const m = chain(translate(1, 2, 3), rotate(10, 20, 30), scale(2, 3, 4));

  it("identity on the left is a no-op", () => {
    expect(multiply(identity(), m)).toEqual(m);
  });

  it("identity on the right is a no-op", () => {
    expect(multiply(m, identity())).toEqual(m);
  });

  it("compose with identity is a no-op either way", () => {
    expect(compose(identity(), m)).toEqual(m);
    expect(compose(m, identity())).toEqual(m);
  });
});

describe("rotation", () => {
  it("is orthonormal for arbitrary angles", () => {
    const angles: [number, number, number][] = [
      [37, -52, 118],
      [0, 90, 0],
      [200, 15, -300],
    ];
    const expected = [1, 0, 0, 0, 1, 0, 0, 0, 1];
    for (const [x, y, z] of angles) {
      const product = timesTranspose(linearPart(rotate(x, y, z)));
      product.forEach((value, i) => expect(value).toBeCloseTo(expected[i], EPSILON));
    }
  });

  it("composes as rotateZ * rotateY * rotateX, exactly", () => {
    expect(rotate(30, 45, 60)).toEqual(multiply(multiply(rotateZ(60), rotateY(45)), rotateX(30)));
    expect(rotate(-12, 0, 170)).toEqual(multiply(multiply(rotateZ(170), rotateY(0)), rotateX(-12)));
  });

  it("differs from the reversed order", () => {
    const reversed = multiply(multiply(rotateX(30), rotateY(45)), rotateZ(60));
    expect(approxEqual(rotate(30, 45, 60), reversed)).toBe(false);
  });
});

describe("translation inverse", () => {
  it("translating back and forth is the identity", () => {
    expect(approxEqual(multiply(translate(1.5, -2, 3), translate(-1.5, 2, -3)), identity())).toBe(true);
  });
});

describe("chain", () => {
  it("is the identity when empty", () => {
    expect(chain()).toEqual(identity());
  });

  it("returns a single matrix unchanged", () => {
    const t = translate(4, 5, 6);
    expect(chain(t)).toBe(t);
  });

  it("applies the rightmost matrix first", () => {
    // scale first, then move
    expect(applyToPoint(chain(translate(10, 0, 0), scale(2, 2, 2)), [1, 1, 1])).toEqual([12, 2, 2]);
  });

  it("is associative", () => {
    const a = translate(1, 2, 3);
    const b = rotate(10, 20, 30);
    const c = scale(2, 1, 0.5);
    expect(approxEqual(multiply(multiply(a, b), c), multiply(a, multiply(b, c)))).toBe(true);
  });
});

describe("compose", () => {
  it("applies first, then second", () => {
    const moved = compose(translate(5, 0, 0), rotateZ(90));
    const p = applyToPoint(moved, [0, 0, 0]);
    expect(p[0]).toBeCloseTo(0, EPSILON);
    expect(p[1]).toBeCloseTo(5, EPSILON);
    expect(p[2]).toBeCloseTo(0, EPSILON);
  });

  it("is not commutative", () => {
    const a = translate(5, 0, 0);
    const b = rotateZ(90);
    expect(approxEqual(compose(a, b), compose(b, a))).toBe(false);
  });
});

describe("approxEqual", () => {
  it("honours an explicit tolerance", () => {
    const a = translate(1, 0, 0);
    const b = translate(1.001, 0, 0);
    expect(approxEqual(a, b)).toBe(false);
    expect(approxEqual(a, b, 0.01)).toBe(true);
  });
});

describe("isAffine", () => {
  it("accepts products of builders", () => {
    expect(isAffine(chain(translate(1, 2, 3), rotate(5, 6, 7), scale(3)))).toBe(true);
  });

  it("rejects a projective last row", () => {
    const m = fromRows([
      [1, 0, 0, 0],
      [0, 1, 0, 0],
      [0, 0, 1, 0],
      [0, 0, 0.5, 1],
    ]);
    expect(isAffine(m)).toBe(false);
  });
});

describe("rows", () => {
  it("toRows splits a matrix into its rows", () => {
    expect(toRows(translate(1, 2, 3))).toEqual([
      [1, 0, 0, 1],
      [0, 1, 0, 2],
      [0, 0, 1, 3],
      [0, 0, 0, 1],
    ]);
  });

  it("fromRows inverts toRows", () => {
    const m = rotate(10, 20, 30);
    expect(fromRows(toRows(m))).toEqual(m);
  });

  it("fromRows rejects anything but 4x4", () => {
    expect(() => fromRows([[1, 0, 0]])).toThrow(InvalidArgumentError);
    expect(() => fromRows([])).toThrow("fromRows: rows must be 4x4, got no rows");
  });
});

describe("linearPart", () => {
  it("drops the translation column", () => {
    expect(linearPart(chain(translate(9, 9, 9), scale(2, 3, 4)))).toEqual([2, 0, 0, 0, 3, 0, 0, 0, 4]);
  });
});

import { describe, expect, it } from "vitest";
import fc from "fast-check";
import { floatWeights } from "../src/Network/Weights.js";
import { AttributeBag } from "../src/Onnx/AttributeBag.js";
import {
    axesToMask,
    checkRank,
    convertAxis,
    isPermutation,
    isTransposeRequired,
    maskToAxes,
    resolveReshape,
    squeezeLeadingDims,
    squeezeTrailingDims,
    transposeWeights,
} from "../src/Lowering/ShapeUtils.js";
import { ErrorKind } from "../src/Lowering/errors.js";

describe("axes", () => {
    it("wraps negative axes", () => {
        expect(convertAxis(-1, 4)).toEqual({ ok: true, value: 3 });
        expect(convertAxis(2, 4)).toEqual({ ok: true, value: 2 });
    });

    it("rejects axes outside the rank", () => {
        const result = convertAxis(4, 4);
        expect(result.ok).toBe(false);
        if (!result.ok) expect(result.error.message).toBe("axis 4 is out of range for rank 4");
    });

    it("round-trips axis masks", () => {
        expect(axesToMask([0, 2, 3])).toBe(13);
        expect(maskToAxes(13, 4)).toEqual([0, 2, 3]);
    });

    it("caps the rank at eight", () => {
        expect(checkRank(8).ok).toBe(true);
        const result = checkRank(9);
        expect(result.ok).toBe(false);
        if (!result.ok) expect(result.error.kind).toBe(ErrorKind.UnsupportedNodeForm);
    });
});

describe("shapes", () => {
    it("squeezes unit dimensions from either end", () => {
        expect(squeezeTrailingDims([1, 3, 1, 1])).toEqual([1, 3]);
        expect(squeezeLeadingDims([1, 1, 3, 1])).toEqual([3, 1]);
    });

    it("resolves copied and inferred reshape dimensions", () => {
        expect(resolveReshape([2, 3, 4], [0, -1])).toEqual({ ok: true, value: [2, 12] });
        expect(resolveReshape([2, 3, 4], [4, 0, 2])).toEqual({ ok: true, value: [4, 3, 2] });
    });

    it("rejects reshapes that change the volume", () => {
        expect(resolveReshape([2, 3], [4, -1]).ok).toBe(false);
        expect(resolveReshape([2, 3], [-1, -1]).ok).toBe(false);
        expect(resolveReshape([2, 3], [5]).ok).toBe(false);
    });

    it("recognises permutations", () => {
        expect(isPermutation([2, 0, 1], 3)).toBe(true);
        expect(isPermutation([0, 0, 1], 3)).toBe(false);
        expect(isPermutation([0, 1], 3)).toBe(false);
    });
});

describe("transposes", () => {
    it("needs a data move only when non-unit dimensions swap", () => {
        expect(isTransposeRequired([1, 3, 1, 4], [2, 1, 0, 3])).toBe(false);
        expect(isTransposeRequired([2, 3], [1, 0])).toBe(true);
        expect(isTransposeRequired([1, -1], [1, 0])).toBe(true);
    });

    it("reorders constant buffers", () => {
        const weights = floatWeights([2, 3], [1, 2, 3, 4, 5, 6]);
        const transposed = transposeWeights(weights, [1, 0]);
        expect(transposed.shape).toEqual([3, 2]);
        expect(Array.from(transposed.values)).toEqual([1, 4, 2, 5, 3, 6]);
    });

    it("keeps the element order whenever no transpose is required", () => {
        const shapeAndPerm = fc
            .array(fc.integer({ min: 1, max: 3 }), { minLength: 1, maxLength: 4 })
            .chain((shape) =>
                fc.shuffledSubarray(
                    shape.map((_, i) => i),
                    { minLength: shape.length, maxLength: shape.length },
                ).map((perm) => ({ shape, perm })),
            );
        fc.assert(
            fc.property(shapeAndPerm, ({ shape, perm }) => {
                fc.pre(!isTransposeRequired(shape, perm));
                const count = shape.reduce((a, b) => a * b, 1);
                const values = Array.from({ length: count }, (_, i) => i);
                const transposed = transposeWeights(floatWeights(shape, values), perm);
                expect(Array.from(transposed.values)).toEqual(values);
            }),
        );
    });
});

describe("attributes", () => {
    const bag = new AttributeBag([
        ["axis", { type: "int", value: -1 }],
        ["alpha", { type: "float", value: 0.5 }],
        ["pads", { type: "ints", value: [1, 1, 2, 2] }],
        ["mode", { type: "string", value: "constant" }],
    ]);

    it("returns typed values and fallbacks", () => {
        expect(bag.getInt("axis", 0)).toBe(-1);
        expect(bag.getInt("missing", 7)).toBe(7);
        expect(bag.getInt("missing")).toBeUndefined();
        expect(bag.getFloat("alpha", 1)).toBe(0.5);
        expect(bag.getString("mode", "reflect")).toBe("constant");
        expect(bag.getInts("pads", [])).toEqual([1, 1, 2, 2]);
    });

    it("widens integers for float getters only", () => {
        expect(bag.getFloat("axis")).toBe(-1);
        expect(bag.getFloats("pads")).toEqual([1, 1, 2, 2]);
        expect(bag.getInt("alpha", 3)).toBe(3);
        expect(bag.getString("axis")).toBeUndefined();
    });

    it("hands out copies of list attributes", () => {
        const pads = bag.getInts("pads", []);
        pads[0] = 9;
        expect(bag.getInts("pads", [])).toEqual([1, 1, 2, 2]);
        expect(bag.names()).toEqual(["axis", "alpha", "pads", "mode"]);
    });
});

import { describe, expect, it } from "vitest";
import fc from "fast-check";
import { PaddingMode } from "../src/Network/LayerTypes.js";
import { AttributeBag, AttributeValue } from "../src/Onnx/AttributeBag.js";
import { ErrorKind } from "../src/Lowering/errors.js";
import {
    averagePoolPadding,
    convOutputSize,
    getKernelParams,
    resolveTransposedPadding,
    sameForwardPadding,
    sameTransposedPadding,
} from "../src/Lowering/Padding.js";

function bag(entries: Record<string, AttributeValue>): AttributeBag {
    return new AttributeBag(Object.entries(entries));
}

describe("kernel attributes", () => {
    it("fills defaults and splits pads into begins and ends", () => {
        const result = getKernelParams(
            bag({ kernel_shape: { type: "ints", value: [3, 3] }, pads: { type: "ints", value: [1, 0, 2, 1] } }),
            2,
        );
        expect(result.ok).toBe(true);
        if (!result.ok) return;
        expect(result.value.strides).toEqual([1, 1]);
        expect(result.value.dilations).toEqual([1, 1]);
        expect(result.value.begin).toEqual([1, 0]);
        expect(result.value.end).toEqual([2, 1]);
        expect(result.value.mode).toBe(PaddingMode.EXPLICIT);
        expect(result.value.excludePadding).toBe(true);
    });

    it("drops explicit pads under VALID", () => {
        const result = getKernelParams(
            bag({
                kernel_shape: { type: "ints", value: [2] },
                pads: { type: "ints", value: [1, 1] },
                auto_pad: { type: "string", value: "VALID" },
            }),
            1,
        );
        expect(result.ok && result.value.begin).toEqual([0]);
        expect(result.ok && result.value.end).toEqual([0]);
    });

    it("checks list lengths and positive strides", () => {
        const short = getKernelParams(
            bag({ kernel_shape: { type: "ints", value: [3, 3] }, pads: { type: "ints", value: [1, 1] } }),
            2,
        );
        expect(short.ok).toBe(false);
        if (!short.ok) expect(short.error.message).toBe("pads has 2 entries, expected 4");

        const zero = getKernelParams(
            bag({ kernel_shape: { type: "ints", value: [3] }, strides: { type: "ints", value: [0] } }),
            1,
        );
        expect(zero.ok).toBe(false);
        if (!zero.ok) expect(zero.error.kind).toBe(ErrorKind.InvalidValue);
    });

    it("falls back to a given kernel", () => {
        const result = getKernelParams(bag({}), 2, [4, 4]);
        expect(result.ok && result.value.kernel).toEqual([4, 4]);
    });
});

describe("same padding", () => {
    it("puts the odd unit at the end for same-upper and at the beginning for same-lower", () => {
        expect(sameForwardPadding(4, 2, 1, 1, PaddingMode.SAME_UPPER)).toEqual({ begin: 0, end: 1 });
        expect(sameForwardPadding(4, 2, 1, 1, PaddingMode.SAME_LOWER)).toEqual({ begin: 1, end: 0 });
        expect(sameForwardPadding(5, 3, 2, 1, PaddingMode.SAME_UPPER)).toEqual({ begin: 1, end: 1 });
    });

    it("always reaches ceil(input / stride) outputs", () => {
        fc.assert(
            fc.property(
                fc.integer({ min: 1, max: 64 }),
                fc.integer({ min: 1, max: 7 }),
                fc.integer({ min: 1, max: 4 }),
                fc.integer({ min: 1, max: 3 }),
                fc.constantFrom(PaddingMode.SAME_UPPER, PaddingMode.SAME_LOWER),
                (input, kernel, stride, dilation, mode) => {
                    const { begin, end } = sameForwardPadding(input, kernel, stride, dilation, mode);
                    expect(Math.abs(begin - end)).toBeLessThanOrEqual(1);
                    expect(convOutputSize(input, kernel, stride, dilation, begin, end)).toBe(Math.ceil(input / stride));
                },
            ),
        );
    });

    it("gives the remainder to the beginning of a same-upper transposed op", () => {
        expect(sameTransposedPadding(2, 3, 2, 1, 0, 4, PaddingMode.SAME_UPPER)).toEqual({ begin: 1, end: 0, total: 1 });
        expect(sameTransposedPadding(2, 3, 2, 1, 0, 4, PaddingMode.SAME_LOWER)).toEqual({ begin: 0, end: 1, total: 1 });
    });

    it("derives extra output padding from an explicit output shape", () => {
        const params = getKernelParams(
            bag({
                kernel_shape: { type: "ints", value: [3] },
                strides: { type: "ints", value: [2] },
                output_shape: { type: "ints", value: [6] },
            }),
            1,
        );
        expect(params.ok).toBe(true);
        if (!params.ok) return;
        // (2 - 1) * 2 + 3 = 5, one short of 6.
        expect(resolveTransposedPadding([2], params.value)).toEqual({
            ok: true,
            value: { begin: [0], end: [0], outputPadding: [1] },
        });
    });
});

describe("average pooling padding", () => {
    it("shifts an uneven end into a cropped extra stride", () => {
        expect(averagePoolPadding([1, 0], [1, 1], [2, 2])).toEqual({
            ok: true,
            value: { begin: [1, 2], end: [1, 1], crop: [false, true] },
        });
    });

    it("rejects other asymmetric padding", () => {
        const result = averagePoolPadding([0], [2], [1]);
        expect(result.ok).toBe(false);
        if (!result.ok) expect(result.error.kind).toBe(ErrorKind.UnsupportedNodeForm);
    });
});

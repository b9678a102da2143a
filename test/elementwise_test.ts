import { describe, expect, it } from "vitest";
import fc from "fast-check";
import { ElementWiseOperation, NetworkDataType } from "../src/Network/LayerTypes.js";
import { AttributeBag } from "../src/Onnx/AttributeBag.js";
import { ErrorKind } from "../src/Lowering/errors.js";
import { combineTensorsElementwise, legacyBroadcastShape } from "../src/Lowering/Elementwise.js";
import { tensorValue } from "../src/Lowering/Value.js";
import { testContext } from "./support/models.js";

describe("legacyBroadcastShape", () => {
    it("pads the operand with ones around the axis", () => {
        expect(legacyBroadcastShape(3, [3], 1)).toEqual({ ok: true, value: [1, 3, 1] });
        expect(legacyBroadcastShape(4, [2, 3], 2)).toEqual({ ok: true, value: [1, 1, 2, 3] });
    });

    it("rejects an axis past the end", () => {
        const result = legacyBroadcastShape(3, [3], 3);
        expect(result.ok).toBe(false);
        if (!result.ok) expect(result.error.message).toBe("legacy broadcast of rank 1 at axis 3 does not fit rank 3");
    });
});

describe("combineTensorsElementwise", () => {
    it("gives every operand the highest rank", () => {
        fc.assert(
            fc.property(
                fc.array(fc.integer({ min: 1, max: 4 }), { minLength: 1, maxLength: 4 }),
                fc.nat(),
                fc.array(fc.boolean(), { minLength: 4, maxLength: 4 }),
                (shape, drop, ones) => {
                    const suffix = shape.slice(drop % shape.length).map((d, i) => (ones[i] ? 1 : d));
                    const ctx = testContext();
                    const a = ctx.network.addInput("A", NetworkDataType.FLOAT, shape);
                    const b = ctx.network.addInput("B", NetworkDataType.FLOAT, suffix);
                    const result = combineTensorsElementwise(
                        ctx,
                        [tensorValue(a), tensorValue(b)],
                        ElementWiseOperation.SUM,
                    );
                    expect(result.ok && result.value.shape).toEqual(shape);
                },
            ),
        );
    });

    it("reports the axis where shapes clash", () => {
        const ctx = testContext();
        const a = ctx.network.addInput("A", NetworkDataType.FLOAT, [2, 3]);
        const b = ctx.network.addInput("B", NetworkDataType.FLOAT, [4]);
        const result = combineTensorsElementwise(ctx, [tensorValue(a), tensorValue(b)], ElementWiseOperation.PROD);
        expect(result.ok).toBe(false);
        if (!result.ok) {
            expect(result.error.kind).toBe(ErrorKind.InvalidNode);
            expect(result.error.message).toBe("cannot broadcast [2,3] with [1,4] on axis 1");
        }
    });

    it("passes a single operand through an identity", () => {
        const ctx = testContext();
        const a = ctx.network.addInput("A", NetworkDataType.FLOAT, [2]);
        const result = combineTensorsElementwise(ctx, [tensorValue(a)], ElementWiseOperation.MAX);
        expect(result.ok).toBe(true);
        expect(ctx.network.graph.getLayers().toArray().map((layer) => layer.kind)).toEqual(["Identity"]);
    });

    it("needs broadcast=1 for differing shapes before opset 7", () => {
        const ctx = testContext(6);
        const a = ctx.network.addInput("A", NetworkDataType.FLOAT, [2, 3]);
        const b = ctx.network.addInput("B", NetworkDataType.FLOAT, [3]);
        const result = combineTensorsElementwise(ctx, [tensorValue(a), tensorValue(b)], ElementWiseOperation.SUM, {
            legacyBroadcast: true,
            attrs: new AttributeBag(),
        });
        expect(result.ok).toBe(false);
        if (!result.ok) {
            expect(result.error.kind).toBe(ErrorKind.UnsupportedNodeForm);
            expect(result.error.message).toBe("operands of different shapes need broadcast=1 before opset 7");
        }
    });
});

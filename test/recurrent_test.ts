import { describe, expect, it } from "vitest";
import { floatWeights } from "../src/Network/Weights.js";
import { LoopOutputKind } from "../src/Network/LayerTypes.js";
import { ErrorKind } from "../src/Lowering/errors.js";
import { lowerModel } from "../src/lowering.js";
import { HostTensor, NetworkEvaluator, hostTensor } from "./support/NetworkEvaluator.js";
import { RecurrentCase, gruReference, lstmReference } from "./support/recurrentReference.js";
import { attr, graph, info, lower, model, node, outputOf, quietOptions, sampleValues } from "./support/models.js";

function expectClose(actual: HostTensor, shape: number[], expected: number[]): void {
  expect(actual.shape).toEqual(shape);
  expect(actual.data).toHaveLength(expected.length);
  actual.data.forEach((v, i) => expect(Math.abs(v - expected[i])).toBeLessThan(1e-5));
}

function recurrentCase(gates: number, numDirections: number, withBias: boolean): RecurrentCase {
  const seqLength = 3;
  const batch = 2;
  const inputSize = 2;
  const hiddenSize = 2;
  return {
    seqLength,
    batch,
    inputSize,
    hiddenSize,
    numDirections,
    x: sampleValues(seqLength * batch * inputSize, 1),
    w: sampleValues(numDirections * gates * hiddenSize * inputSize, 2),
    r: sampleValues(numDirections * gates * hiddenSize * hiddenSize, 3),
    bias: withBias ? sampleValues(numDirections * 2 * gates * hiddenSize, 4) : undefined,
  };
}

function recurrentModel(opType: "GRU" | "LSTM", c: RecurrentCase, gates: number, attributes: Parameters<typeof node>[3]) {
  const { numDirections: D, hiddenSize: H, inputSize: E } = c;
  const initializers = {
    W: floatWeights([D, gates * H, E], c.w),
    R: floatWeights([D, gates * H, H], c.r),
    ...(c.bias !== undefined ? { B: floatWeights([D, 2 * gates * H], c.bias) } : {}),
  };
  const outputs = opType === "GRU" ? ["Y", "Y_h"] : ["Y", "Y_h", "Y_c"];
  const rnn = node(opType, ["X", "W", "R", c.bias !== undefined ? "B" : undefined], outputs, {
    hidden_size: attr.int(H),
    ...attributes,
  });
  return model(graph([rnn], [info("X", [c.seqLength, c.batch, E])], outputs, initializers));
}

function run(c: RecurrentCase, m: ReturnType<typeof model>, names: string[]): HostTensor[] {
  const lowered = lower(m);
  const evaluator = new NetworkEvaluator(lowered.network, {
    X: hostTensor([c.seqLength, c.batch, c.inputSize], c.x),
  });
  return names.map((name) => evaluator.value(outputOf(lowered, name)));
}

describe("GRU", () => {
  it("matches the step-by-step definition going forward with a bias", () => {
    const c = recurrentCase(3, 1, true);
    const [y, yh] = run(c, recurrentModel("GRU", c, 3, {}), ["Y", "Y_h"]);
    const expected = gruReference(c, false);
    expectClose(y, [3, 1, 2, 2], expected.y);
    expectClose(yh, [1, 2, 2], expected.yh);
  });

  it("matches the definition in both directions without a bias", () => {
    const c = recurrentCase(3, 2, false);
    const [y, yh] = run(c, recurrentModel("GRU", c, 3, { direction: attr.string("bidirectional") }), ["Y", "Y_h"]);
    const expected = gruReference(c, false);
    expectClose(y, [3, 2, 2, 2], expected.y);
    expectClose(yh, [2, 2, 2], expected.yh);
  });

  it("applies the reset gate after the recurrence projection with linear_before_reset", () => {
    const c = recurrentCase(3, 1, true);
    const [y, yh] = run(c, recurrentModel("GRU", c, 3, { linear_before_reset: attr.int(1) }), ["Y", "Y_h"]);
    const expected = gruReference(c, true);
    expectClose(y, [3, 1, 2, 2], expected.y);
    expectClose(yh, [1, 2, 2], expected.yh);
  });

  it("writes the reverse pass back in time order", () => {
    const c = recurrentCase(3, 1, true);
    const lowered = lower(recurrentModel("GRU", c, 3, { direction: attr.string("reverse") }));
    const kinds = lowered.network
      .getLayers()
      .toArray()
      .flatMap((layer) => (layer.params.kind === "LoopOutput" ? [layer.params.outputKind] : []));
    expect(kinds).toEqual([LoopOutputKind.REVERSE, LoopOutputKind.LAST_VALUE]);
  });

  it("rejects clipping", () => {
    const c = recurrentCase(3, 1, false);
    const result = lowerModel(recurrentModel("GRU", c, 3, { clip: attr.float(1) }), quietOptions);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe(ErrorKind.UnsupportedNodeForm);
      expect(result.error.opType).toBe("GRU");
    }
  });

  it("treats an explicit zero clip as a clipping request", () => {
    const c = recurrentCase(3, 1, false);
    const result = lowerModel(recurrentModel("GRU", c, 3, { clip: attr.float(0) }), quietOptions);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.message).toBe("GRU clipping");
  });
});

describe("LSTM", () => {
  it("matches the step-by-step definition going forward", () => {
    const c = recurrentCase(4, 1, true);
    const [y, yh, yc] = run(c, recurrentModel("LSTM", c, 4, {}), ["Y", "Y_h", "Y_c"]);
    const expected = lstmReference(c);
    expectClose(y, [3, 1, 2, 2], expected.y);
    expectClose(yh, [1, 2, 2], expected.yh);
    expectClose(yc, [1, 2, 2], expected.yc);
  });

  it("matches the definition in both directions", () => {
    const c = recurrentCase(4, 2, true);
    const [y, yh, yc] = run(c, recurrentModel("LSTM", c, 4, { direction: attr.string("bidirectional") }), [
      "Y",
      "Y_h",
      "Y_c",
    ]);
    const expected = lstmReference(c);
    expectClose(y, [3, 2, 2, 2], expected.y);
    expectClose(yh, [2, 2, 2], expected.yh);
    expectClose(yc, [2, 2, 2], expected.yc);
  });

  it("rejects coupled input and forget gates", () => {
    const c = recurrentCase(4, 1, false);
    const result = lowerModel(recurrentModel("LSTM", c, 4, { input_forget: attr.int(1) }), quietOptions);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.kind).toBe(ErrorKind.UnsupportedNodeForm);
  });
});

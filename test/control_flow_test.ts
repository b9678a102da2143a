import { describe, expect, it } from "vitest";
import { NetworkDataType } from "../src/Network/LayerTypes.js";
import { boolWeights, floatWeights, int32Weights } from "../src/Network/Weights.js";
import { ErrorKind } from "../src/Lowering/errors.js";
import { lowerModel } from "../src/lowering.js";
import { NetworkEvaluator, hostTensor } from "./support/NetworkEvaluator.js";
import { attr, graph, info, lower, model, node, outputOf, quietOptions } from "./support/models.js";

const { INT32, BOOL } = NetworkDataType;

describe("Loop", () => {
  // v(i+1) = v(i) + 1, with every v(i+1) collected as a scan output.
  const counterBody = graph(
    [
      node("Identity", ["cond_in"], ["cond_out"], {}, "keep_going"),
      node("Add", ["v_in", "one"], ["v_out"], {}, "increment"),
      node("Identity", ["v_out"], ["scan_out"], {}, "collect"),
    ],
    [info("iter", [], INT32), info("cond_in", [], BOOL), info("v_in", [2])],
    ["cond_out", "v_out", "scan_out"],
    { one: floatWeights([2], [1, 1]) },
    "counter",
  );

  it("runs a counted loop and stacks the scan outputs", () => {
    const m = model(
      graph(
        [node("Loop", ["M", "cond", "X"], ["v_final", "scans"], { body: attr.graph(counterBody) })],
        [info("X", [2])],
        ["v_final", "scans"],
        { M: int32Weights([], [3]), cond: boolWeights([], [1]) },
      ),
    );
    const lowered = lower(m);
    const evaluator = new NetworkEvaluator(lowered.network, { X: hostTensor([2], [1, 2]) });

    expect(outputOf(lowered, "scans").shape).toEqual([3, 2]);
    expect(evaluator.value(outputOf(lowered, "v_final"))).toEqual({ shape: [2], data: [4, 5] });
    expect(evaluator.value(outputOf(lowered, "scans"))).toEqual({ shape: [3, 2], data: [2, 3, 3, 4, 4, 5] });
  });

  it("stops on the condition when there is no trip count", () => {
    const body = graph(
      [
        node("Less", ["iter", "two"], ["cond_out"], {}, "below_two"),
        node("Add", ["v_in", "one"], ["v_out"], {}, "increment"),
      ],
      [info("iter", [], INT32), info("cond_in", [], BOOL), info("v_in", [2])],
      ["cond_out", "v_out"],
      { one: floatWeights([2], [1, 1]), two: int32Weights([], [2]) },
      "while_body",
    );
    const m = model(
      graph(
        [node("Loop", [undefined, "cond", "X"], ["v_final"], { body: attr.graph(body) })],
        [info("X", [2])],
        ["v_final"],
        { cond: boolWeights([], [1]) },
      ),
    );
    const lowered = lower(m);
    const evaluator = new NetworkEvaluator(lowered.network, { X: hostTensor([2], [1, 2]) });

    // The body runs for iterations 0, 1 and 2; Less(2, 2) ends the loop.
    expect(evaluator.value(outputOf(lowered, "v_final"))).toEqual({ shape: [2], data: [4, 5] });
  });

  it("rejects a body whose inputs do not match the loop state", () => {
    const m = model(
      graph(
        [node("Loop", ["M", "cond", "X", "X"], ["a", "b"], { body: attr.graph(counterBody) })],
        [info("X", [2])],
        ["a", "b"],
        { M: int32Weights([], [3]), cond: boolWeights([], [1]) },
      ),
    );
    const result = lowerModel(m, quietOptions);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe(ErrorKind.InvalidNode);
      expect(result.error.message).toBe("Loop body takes 3 inputs, expected 4");
    }
  });
});

describe("Scan", () => {
  // Running sum over the rows of X.
  const runningSum = graph(
    [node("Add", ["s_in", "x_in"], ["s_out"], {}, "accumulate"), node("Identity", ["s_out"], ["y_out"], {}, "emit")],
    [info("s_in", [2]), info("x_in", [2])],
    ["s_out", "y_out"],
    {},
    "running_sum",
  );

  function scanModel(attributes: Record<string, ReturnType<typeof attr.ints>>, opset = 11) {
    return model(
      graph(
        [
          node("Scan", ["S0", "X"], ["s_final", "ys"], {
            body: attr.graph(runningSum),
            num_scan_inputs: attr.int(1),
            ...attributes,
          }),
        ],
        [info("X", [3, 2])],
        ["s_final", "ys"],
        { S0: floatWeights([2], [0, 0]) },
      ),
      opset,
    );
  }

  function run(attributes: Record<string, ReturnType<typeof attr.ints>>) {
    const lowered = lower(scanModel(attributes));
    const evaluator = new NetworkEvaluator(lowered.network, { X: hostTensor([3, 2], [1, 2, 3, 4, 5, 6]) });
    return {
      state: evaluator.value(outputOf(lowered, "s_final")),
      ys: evaluator.value(outputOf(lowered, "ys")),
    };
  }

  it("iterates the first axis and concatenates the outputs", () => {
    const { state, ys } = run({});
    expect(state).toEqual({ shape: [2], data: [9, 12] });
    expect(ys).toEqual({ shape: [3, 2], data: [1, 2, 4, 6, 9, 12] });
  });

  it("reads a scan input backwards", () => {
    const { state, ys } = run({ scan_input_directions: attr.ints([1]) });
    expect(state).toEqual({ shape: [2], data: [9, 12] });
    expect(ys).toEqual({ shape: [3, 2], data: [5, 6, 8, 10, 9, 12] });
  });

  it("writes a scan output backwards", () => {
    const { ys } = run({ scan_output_directions: attr.ints([1]) });
    expect(ys).toEqual({ shape: [3, 2], data: [9, 12, 4, 6, 1, 2] });
  });

  it("stacks a scan output along another axis", () => {
    const { ys } = run({ scan_output_axes: attr.ints([1]) });
    expect(ys).toEqual({ shape: [2, 3], data: [1, 4, 9, 2, 6, 12] });
  });

  it("rejects the batched form of opset 8", () => {
    const result = lowerModel(scanModel({}, 8), quietOptions);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe(ErrorKind.UnsupportedNodeForm);
      expect(result.error.opType).toBe("Scan");
    }
  });
});

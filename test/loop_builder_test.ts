import { describe, expect, it } from "vitest";
import { ElementWiseOperation, LoopOutputKind, TripLimit } from "../src/Network/LayerTypes.js";
import { NetworkBuilder } from "../src/Network/NetworkBuilder.js";
import { boolWeights, floatWeights, int32Weights } from "../src/Network/Weights.js";
import { LoopConstructionError, NetworkConstructionError, RegistryError, ok } from "../src/Lowering/errors.js";
import { OperatorRegistry } from "../src/Lowering/OperatorRegistry.js";
import { LoopBuilder, LoopState } from "../src/Lowering/recurrent/LoopBuilder.js";
import { createDefaultRegistry } from "../src/Lowering/importers/index.js";

function setup() {
    const network = new NetworkBuilder("loops");
    const count = network.addConstant(int32Weights([], [4]));
    const initial = network.addConstant(floatWeights([2], [0, 0]));
    return { network, count, initial };
}

describe("LoopBuilder", () => {
    it("walks through its states", () => {
        const { network, count, initial } = setup();
        const loop = new LoopBuilder(network);
        expect(loop.id).toBe("loop0");
        expect(loop.currentState).toBe(LoopState.Unstarted);

        loop.addTripLimit(count, TripLimit.COUNT);
        const state = loop.addRecurrence(initial);
        loop.beginBody();
        expect(loop.currentState).toBe(LoopState.BodyDefined);

        const next = network.addElementWise(state.output, initial, ElementWiseOperation.SUM);
        loop.setNext(state, next);
        const out = loop.addOutput(next, LoopOutputKind.CONCATENATE, 0, count);
        loop.finalize();

        expect(loop.currentState).toBe(LoopState.Finalized);
        expect(out.shape).toEqual([4, 2]);
    });

    it("needs a trip limit before the body", () => {
        const { network, initial } = setup();
        const loop = new LoopBuilder(network);
        loop.addRecurrence(initial);
        expect(() => loop.beginBody()).toThrow(new LoopConstructionError("loop0: has no trip limit"));
    });

    it("refuses recurrences once the body has begun", () => {
        const { network, count, initial } = setup();
        const loop = new LoopBuilder(network);
        loop.addTripLimit(count, TripLimit.COUNT);
        loop.beginBody();
        expect(() => loop.addRecurrence(initial)).toThrow(
            new LoopConstructionError("loop0: cannot add a recurrence in state BodyDefined"),
        );
        expect(() => loop.addTripLimit(count, TripLimit.COUNT)).toThrow(LoopConstructionError);
    });

    it("refuses to finalize with an open recurrence", () => {
        const { network, count, initial } = setup();
        const loop = new LoopBuilder(network);
        loop.addTripLimit(count, TripLimit.COUNT);
        loop.addRecurrence(initial);
        loop.beginBody();
        expect(() => loop.finalize()).toThrow(
            new LoopConstructionError("loop0: 1 recurrence(s) never received a next value"),
        );
    });

    it("takes one limit of each kind", () => {
        const { network, count } = setup();
        const loop = new LoopBuilder(network);
        loop.addTripLimit(count, TripLimit.COUNT);
        expect(() => loop.addTripLimit(count, TripLimit.COUNT)).toThrow(
            new LoopConstructionError("loop0: already has a COUNT trip limit"),
        );
    });

    it("numbers loops per network", () => {
        const { network } = setup();
        expect(new LoopBuilder(network).id).toBe("loop0");
        expect(new LoopBuilder(network).id).toBe("loop1");
    });

    it("checks the trip limit tensor", () => {
        const { network, initial } = setup();
        const loop = new LoopBuilder(network);
        expect(() => loop.addTripLimit(initial, TripLimit.COUNT)).toThrow(NetworkConstructionError);
        const flag = network.addConstant(boolWeights([], [1]));
        loop.addTripLimit(flag, TripLimit.WHILE);
    });
});

describe("OperatorRegistry", () => {
    const noop = () => ok([]);

    it("rejects a second importer for the same operator", () => {
        const registry = new OperatorRegistry();
        expect(registry.register("Custom", noop)).toBe(true);
        expect(() => registry.register("Custom", noop)).toThrow(
            new RegistryError("an importer for 'Custom' is already registered"),
        );
    });

    it("is read-only once sealed", () => {
        const registry = new OperatorRegistry().seal();
        expect(() => registry.register("Custom", noop)).toThrow(RegistryError);
        expect(registry.lookup("Custom")).toBeUndefined();
    });

    it("lists names in order", () => {
        const registry = new OperatorRegistry();
        registry.register("Relu", noop);
        registry.register("Add", noop);
        expect(registry.names()).toEqual(["Add", "Relu"]);
    });

    it("covers the built-in operator set and takes extra tables", () => {
        const registry = createDefaultRegistry({ Custom: noop });
        for (const name of ["Conv", "Gemm", "GRU", "LSTM", "Loop", "Scan", "Resize", "TopK", "Custom"]) {
            expect(registry.lookup(name)).toBeDefined();
        }
        expect(registry.lookup("NonMaxSuppression")).toBeUndefined();
        expect(() => createDefaultRegistry({ Add: noop })).toThrow(
            new RegistryError("an importer for 'Add' is already registered"),
        );
    });
});

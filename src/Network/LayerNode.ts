import BaseNode from "@specs-feup/flow/graph/BaseNode";
import Node from "@specs-feup/flow/graph/Node";
import NetworkEdge from "./NetworkEdge.js";
import TensorNode from "./TensorNode.js";
import { LayerKind, LayerParams, loopOf } from "./LayerParams.js";

namespace LayerNode {

    export const TAG = "__network__layer_node";
    export const VERSION = "1";

    export class Class<
        D extends Data = Data,
        S extends ScratchData = ScratchData,
    > extends BaseNode.Class<D, S> {

        get name(): string {
            return this.data[TAG].name;
        }

        get kind(): LayerKind {
            return this.data[TAG].params.kind;
        }

        get params(): LayerParams {
            return this.data[TAG].params;
        }

        get loop(): string | undefined {
            return loopOf(this.data[TAG].params);
        }

        /** Input tensors ordered by slot; unset optional slots are `undefined`. */
        get inputs(): (TensorNode.Class | undefined)[] {
            const ordered: (TensorNode.Class | undefined)[] = [];
            for (const edge of this.incomers.filterIs(NetworkEdge).toArray()) {
                const tensor = edge.source.tryAs(TensorNode);
                if (tensor !== undefined) {
                    ordered[edge.slot] = tensor;
                }
            }
            return Array.from({ length: ordered.length }, (_, i) => ordered[i]);
        }

        get outputs(): TensorNode.Class[] {
            const ordered: TensorNode.Class[] = [];
            for (const edge of this.outgoers.filterIs(NetworkEdge).toArray()) {
                const tensor = edge.target.tryAs(TensorNode);
                if (tensor !== undefined) {
                    ordered[edge.slot] = tensor;
                }
            }
            return ordered;
        }
    }

    export class Builder implements Node.Builder<Data, ScratchData> {

        private name: string;
        private params: LayerParams;

        constructor(name: string, params: LayerParams) {
            this.name = name;
            this.params = params;
        }

        buildData(data: BaseNode.Data): Data {
            return {
                ...data,
                [TAG]: {
                    version: VERSION,
                    name: this.name,
                    params: this.params,
                },
            };
        }

        buildScratchData(scratchData: BaseNode.ScratchData): ScratchData {
            return {
                ...scratchData,
            };
        }
    }

    export const TypeGuard = Node.TagTypeGuard<Data, ScratchData>(TAG, VERSION);

    export interface Data extends BaseNode.Data {
        [TAG]: {
            version: typeof VERSION;
            name: string;
            params: LayerParams;
        };
    }

    export interface ScratchData extends BaseNode.ScratchData {}

}
export default LayerNode;

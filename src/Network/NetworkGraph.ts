import BaseGraph from "@specs-feup/flow/graph/BaseGraph";
import Graph from "@specs-feup/flow/graph/Graph";
import { NodeCollection } from "@specs-feup/flow/graph/NodeCollection";
import TensorNode from "./TensorNode.js";
import LayerNode from "./LayerNode.js";

namespace NetworkGraph {

    export const TAG = "__network__graph";
    export const VERSION = "1";

    export class Class<
        D extends Data = Data,
        S extends ScratchData = ScratchData,
    > extends BaseGraph.Class<D, S> {

        get name(): string {
            return this.data[TAG].name;
        }

        getInputTensors(): NodeCollection<TensorNode.Class> {
            return this.nodes.filterIs(TensorNode).filter(n => n.role === "input");
        }

        getOutputTensors(): NodeCollection<TensorNode.Class> {
            return this.nodes.filterIs(TensorNode).filter(n => n.role === "output");
        }

        getTensors(): NodeCollection<TensorNode.Class> {
            return this.nodes.filterIs(TensorNode);
        }

        getLayers(): NodeCollection<LayerNode.Class> {
            return this.nodes.filterIs(LayerNode);
        }
    }

    export class Builder implements Graph.Builder<Data, ScratchData> {

        private name: string;

        constructor(name: string = "network") {
            this.name = name;
        }

        buildData(data: BaseGraph.Data): Data {
            return {
                ...data,
                [TAG]: {
                    version: VERSION,
                    name: this.name,
                },
            };
        }

        buildScratchData(scratchData: BaseGraph.ScratchData): ScratchData {
            return {
                ...scratchData,
            };
        }
    }

    export const TypeGuard = Graph.TagTypeGuard<Data, ScratchData>(TAG, VERSION);

    export interface Data extends BaseGraph.Data {
        [TAG]: {
            version: typeof VERSION;
            name: string;
        };
    }

    export interface ScratchData extends BaseGraph.ScratchData {}

}
export default NetworkGraph;

import BaseNode from "@specs-feup/flow/graph/BaseNode";
import Node from "@specs-feup/flow/graph/Node";
import { EdgeCollection } from "@specs-feup/flow/graph/EdgeCollection";
import NetworkEdge from "./NetworkEdge.js";
import { NetworkDataType } from "./LayerTypes.js";

namespace TensorNode {

    export const TAG = "__network__tensor_node";
    export const VERSION = "1";

    export type Role = "input" | "output" | "intermediate";

    export class Class<
        D extends Data = Data,
        S extends ScratchData = ScratchData,
    > extends BaseNode.Class<D, S> {

        get name(): string {
            return this.data[TAG].name;
        }

        get dataType(): NetworkDataType {
            return this.data[TAG].dataType;
        }

        get shape(): number[] {
            return this.data[TAG].shape;
        }

        get rank(): number {
            return this.data[TAG].shape.length;
        }

        get role(): Role {
            return this.data[TAG].role;
        }

        set role(value: Role) {
            this.data[TAG].role = value;
        }

        get producerEdges(): EdgeCollection<NetworkEdge.Class> {
            return this.incomers.filterIs(NetworkEdge);
        }

        get consumerEdges(): EdgeCollection<NetworkEdge.Class> {
            return this.outgoers.filterIs(NetworkEdge);
        }
    }

    export class Builder implements Node.Builder<Data, ScratchData> {

        private name: string;
        private dataType: NetworkDataType;
        private shape: number[];
        private role: Role;

        constructor(name: string, dataType: NetworkDataType, shape: number[], role: Role = "intermediate") {
            this.name = name;
            this.dataType = dataType;
            this.shape = shape;
            this.role = role;
        }

        buildData(data: BaseNode.Data): Data {
            return {
                ...data,
                [TAG]: {
                    version: VERSION,
                    name: this.name,
                    dataType: this.dataType,
                    shape: [...this.shape],
                    role: this.role,
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
            dataType: NetworkDataType;
            shape: number[];
            role: Role;
        };
    }

    export interface ScratchData extends BaseNode.ScratchData {}

}
export default TensorNode;

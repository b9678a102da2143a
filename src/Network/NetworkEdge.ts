import BaseEdge from "@specs-feup/flow/graph/BaseEdge";
import Edge from "@specs-feup/flow/graph/Edge";

namespace NetworkEdge {
    export const TAG = "__network__edge";
    export const VERSION = "1";

    export class Class<
        D extends Data = Data,
        S extends ScratchData = ScratchData,
    > extends BaseEdge.Class<D, S> {
        // Input slot of the consuming layer, or output index of the producing one.
        get slot(): number {
            return this.data[TAG].slot;
        }
    }

    export class Builder implements Edge.Builder<Data, ScratchData> {
        private slot: number;

        constructor(slot: number) {
            this.slot = slot;
        }

        buildData(data: BaseEdge.Data): Data {
            return {
                ...data,
                [TAG]: {
                    version: VERSION,
                    slot: this.slot,
                },
            };
        }

        buildScratchData(scratchData: BaseEdge.ScratchData): ScratchData {
            return {
                ...scratchData,
            };
        }
    }

    export const TypeGuard = Edge.TagTypeGuard<Data, ScratchData>(TAG, VERSION);

    export interface Data extends BaseEdge.Data {
        [TAG]: {
            version: typeof VERSION;
            slot: number;
        };
    }

    export interface ScratchData extends BaseEdge.ScratchData {}
}
export default NetworkEdge;

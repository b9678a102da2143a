import TensorNode from "../../Network/TensorNode.js";
import { NetworkBuilder, Recurrence } from "../../Network/NetworkBuilder.js";
import { LoopOutputKind, TripLimit } from "../../Network/LayerTypes.js";
import { LoopConstructionError } from "../errors.js";

export enum LoopState {
  Unstarted = "Unstarted",
  BodyDefined = "BodyDefined",
  Finalized = "Finalized",
}

/**
 * One network loop under construction.
 *
 * Trip limits, recurrences and iterators are wired while the loop is
 * `Unstarted`. `beginBody()` moves it to `BodyDefined`, where next values and
 * outputs are set. `finalize()` closes it once every recurrence has its next
 * value. A call made in the wrong state throws `LoopConstructionError`.
 */
export class LoopBuilder {
  readonly id: string;

  private state = LoopState.Unstarted;
  private readonly limits = new Set<TripLimit>();
  private readonly open = new Set<Recurrence>();

  constructor(private readonly network: NetworkBuilder) {
    this.id = network.addLoop();
  }

  get currentState(): LoopState {
    return this.state;
  }

  /** A WHILE limit may also be added from inside the body. */
  addTripLimit(tensor: TensorNode.Class, limit: TripLimit): void {
    if (this.state === LoopState.Finalized || (limit === TripLimit.COUNT && this.state !== LoopState.Unstarted)) {
      this.fail(`cannot add a ${limit} trip limit`);
    }
    if (this.limits.has(limit)) this.fail(`already has a ${limit} trip limit`);
    this.network.addTripLimit(this.id, tensor, limit);
    this.limits.add(limit);
  }

  addRecurrence(initial: TensorNode.Class): Recurrence {
    this.expect(LoopState.Unstarted, "add a recurrence");
    const recurrence = this.network.addRecurrence(this.id, initial);
    this.open.add(recurrence);
    return recurrence;
  }

  addIterator(tensor: TensorNode.Class, axis: number = 0, reverse: boolean = false): TensorNode.Class {
    this.expect(LoopState.Unstarted, "add an iterator");
    return this.network.addIterator(this.id, tensor, axis, reverse);
  }

  beginBody(): void {
    this.expect(LoopState.Unstarted, "begin the body");
    if (this.limits.size === 0) this.fail("has no trip limit");
    this.state = LoopState.BodyDefined;
  }

  setNext(recurrence: Recurrence, next: TensorNode.Class): void {
    this.expect(LoopState.BodyDefined, "set a recurrence value");
    if (!this.open.has(recurrence)) this.fail("recurrence is not open on this loop");
    this.network.setRecurrenceNext(recurrence, next);
    this.open.delete(recurrence);
  }

  addOutput(
    tensor: TensorNode.Class,
    kind: LoopOutputKind = LoopOutputKind.LAST_VALUE,
    axis: number = 0,
    length?: TensorNode.Class,
  ): TensorNode.Class {
    this.expect(LoopState.BodyDefined, "add an output");
    return this.network.addLoopOutput(this.id, tensor, kind, axis, length);
  }

  finalize(): void {
    this.expect(LoopState.BodyDefined, "finalize");
    if (this.open.size > 0) this.fail(`${this.open.size} recurrence(s) never received a next value`);
    this.state = LoopState.Finalized;
  }

  private expect(state: LoopState, action: string): void {
    if (this.state !== state) this.fail(`cannot ${action} in state ${this.state}`);
  }

  private fail(message: string): never {
    throw new LoopConstructionError(`${this.id}: ${message}`);
  }
}

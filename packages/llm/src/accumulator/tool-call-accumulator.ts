import type { ToolCall, ToolCallDelta } from '../types/index.js';
import { generateToolCallId } from '../utils/id.js';
import { parseArguments } from '../utils/json.js';

export type ToolCallSlot = {
  readonly index: number;
  readonly id: string;
  readonly type: string;
  readonly name: string;
  readonly arguments: string;
};

export type NewToolCallIdCallback = (index: number, toolCallId: string) => void;

type MutableSlot = {
  id: string;
  type: string;
  name: string;
  argumentParts: Array<string>;
};

/**
 * Rebuilds complete tool calls from the index-addressed fragments a backend
 * streams. Arguments arrive as pieces of one JSON string and are only parsed
 * in `finalize()`.
 */
export class ToolCallAccumulator {
  private readonly slots = new Map<number, MutableSlot>();
  private maxIndex = -1;

  /**
   * Folds a batch of deltas into their slots. A call that gets a name or
   * arguments before any id is given a synthesized one on the spot, reported
   * through `onNewId` and written into the returned copy of its delta.
   */
  processDelta(
    deltas: ReadonlyArray<ToolCallDelta>,
    onNewId?: NewToolCallIdCallback,
  ): Array<ToolCallDelta> {
    const patched: Array<ToolCallDelta> = [];

    for (const delta of deltas) {
      if (!Number.isInteger(delta.index) || delta.index < 0) {
        patched.push(delta);
        continue;
      }

      let slot = this.slots.get(delta.index);
      if (!slot) {
        slot = { id: '', type: '', name: '', argumentParts: [] };
        this.slots.set(delta.index, slot);
        this.maxIndex = Math.max(this.maxIndex, delta.index);
      }

      if (delta.id) {
        slot.id = delta.id;
      }
      if (delta.type) {
        slot.type = delta.type;
      }
      if (delta.name) {
        slot.name = delta.name;
      }
      if (delta.arguments) {
        slot.argumentParts.push(delta.arguments);
      }

      if (!slot.id && (delta.name || delta.arguments)) {
        slot.id = generateToolCallId();
        onNewId?.(delta.index, slot.id);
        patched.push({ ...delta, id: slot.id });
        continue;
      }

      patched.push(delta);
    }

    return patched;
  }

  /**
   * Completed calls sorted by index. Slots that never received a function
   * name are skipped. Safe to call repeatedly.
   */
  finalize(): Array<ToolCall> {
    const calls: Array<ToolCall> = [];

    for (let index = 0; index <= this.maxIndex; index++) {
      const slot = this.slots.get(index);
      if (!slot || !slot.name) {
        continue;
      }
      calls.push({
        toolCallId: slot.id,
        toolName: slot.name,
        args: parseArguments(slot.argumentParts.join('')),
      });
    }

    return calls;
  }

  get(index: number): ToolCallSlot | undefined {
    const slot = this.slots.get(index);
    if (!slot) {
      return undefined;
    }
    return {
      index,
      id: slot.id,
      type: slot.type,
      name: slot.name,
      arguments: slot.argumentParts.join(''),
    };
  }

  get count(): number {
    return this.slots.size;
  }

  hasToolCalls(): boolean {
    for (const slot of this.slots.values()) {
      if (slot.name) {
        return true;
      }
    }
    return false;
  }

  reset(): void {
    this.slots.clear();
    this.maxIndex = -1;
  }
}

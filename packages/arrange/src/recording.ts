import { InvalidArgumentError, requireCount } from "@branchwork/core";
import type { Mat4 } from "@branchwork/geometry";
import type { ChildRenderer, PrimitiveParams, PrimitiveRenderer } from "./renderer.js";

export interface ChildCall {
  type: "child";
  index: number;
  matrix: Mat4;
}

export interface PrimitiveCall {
  type: "primitive";
  kind: string;
  params: PrimitiveParams;
  matrix: Mat4;
  label: string;
}

export type RenderCall = ChildCall | PrimitiveCall;

/**
 * In-memory renderer that records every call in order. Useful as a stand-in
 * for a real geometry engine, and for turning an arrangement into data.
 */
export class RecordingRenderer implements ChildRenderer, PrimitiveRenderer {
  private readonly recorded: RenderCall[] = [];

  constructor(private readonly children = 0) {
    requireCount("RecordingRenderer", "children", children);
  }

  childCount(): number {
    return this.children;
  }

  renderChildAt(index: number, matrix: Mat4): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.children) {
      throw new InvalidArgumentError(
        "renderChildAt",
        "index",
        "invalid_index",
        `must name one of ${this.children} children, got ${index}`
      );
    }
    this.recorded.push({ type: "child", index, matrix });
  }

  renderPrimitive(kind: string, params: PrimitiveParams, matrix: Mat4, label: string): void {
    this.recorded.push({ type: "primitive", kind, params, matrix, label });
  }

  get calls(): readonly RenderCall[] {
    return this.recorded;
  }

  childCalls(): ChildCall[] {
    return this.recorded.filter((call): call is ChildCall => call.type === "child");
  }

  primitiveCalls(): PrimitiveCall[] {
    return this.recorded.filter((call): call is PrimitiveCall => call.type === "primitive");
  }

  clear(): void {
    this.recorded.length = 0;
  }
}

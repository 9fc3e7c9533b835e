/** Position and size in EMU (914400 per inch). */
export interface Frame {
  x: number;
  y: number;
  cx: number;
  cy: number;
}

export interface TextRun {
  readonly text: string;
  setText(value: string): void;
}

export interface TextUnit {
  readonly runs: readonly TextRun[];
  /** Run texts joined, paragraphs separated by newlines. */
  readonly text: string;
  clear(): void;
}

interface ShapeBase {
  name: string;
  frame: Frame | null;
}

export interface TextShape extends ShapeBase {
  kind: "text";
  body: TextUnit;
}

export interface GroupShape extends ShapeBase {
  kind: "group";
  children: Shape[];
}

export interface TableShape extends ShapeBase {
  kind: "table";
  rows: TextUnit[][];
}

export interface OtherShape extends ShapeBase {
  kind: "other";
}

export type Shape = TextShape | GroupShape | TableShape | OtherShape;

export function asTextUnit(shape: Shape): TextUnit | null {
  return shape.kind === "text" ? shape.body : null;
}

export function asContainer(shape: Shape): readonly Shape[] | null {
  return shape.kind === "group" ? shape.children : null;
}

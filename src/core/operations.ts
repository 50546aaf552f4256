/**
 * Operation model shared by the translator and the Docs API client.
 *
 * Operations are positional edits addressed in the flat character index
 * space of a Google Docs body, where index 0 is reserved and the first
 * insertable position is 1. {@link toRequest} serializes each variant to the
 * exact JSON shape expected by `documents.batchUpdate`.
 *
 * @module core/operations
 */

// --- Addressing ---

/** Half-open `[start, end)` span of document indices. */
export interface Range {
  start: number;
  end: number;
}

/** A single insertion point. */
export interface Location {
  index: number;
}

/** Character styling applied by {@link SetTextStyle}. */
export interface TextStyle {
  bold?: boolean;
  italic?: boolean;
  underline?: boolean;
}

// --- Operation variants ---

export interface InsertText {
  type: 'insertText';
  location: Location;
  text: string;
}

export interface SetParagraphStyle {
  type: 'setParagraphStyle';
  range: Range;
  styleName: string;
}

export interface SetTextStyle {
  type: 'setTextStyle';
  range: Range;
  style: TextStyle;
}

export interface ApplyListBullets {
  type: 'applyListBullets';
  range: Range;
  presetName: string;
}

export type Operation = InsertText | SetParagraphStyle | SetTextStyle | ApplyListBullets;

export function insertText(offset: number, text: string): InsertText {
  return { type: 'insertText', location: { index: offset }, text };
}

export function setParagraphStyle(range: Range, styleName: string): SetParagraphStyle {
  return { type: 'setParagraphStyle', range, styleName };
}

export function setTextStyle(range: Range, style: TextStyle): SetTextStyle {
  return { type: 'setTextStyle', range, style };
}

export function applyListBullets(range: Range, presetName: string): ApplyListBullets {
  return { type: 'applyListBullets', range, presetName };
}

// --- Wire format ---

/** `Range` as the Docs API spells it. */
export interface WireRange {
  startIndex: number;
  endIndex: number;
}

export interface InsertTextRequest {
  insertText: {
    location: { index: number };
    text: string;
  };
}

export interface UpdateParagraphStyleRequest {
  updateParagraphStyle: {
    range: WireRange;
    paragraphStyle: { namedStyleType: string };
    fields: 'namedStyleType';
  };
}

export interface UpdateTextStyleRequest {
  updateTextStyle: {
    range: WireRange;
    textStyle: TextStyle;
    fields: string;
  };
}

export interface CreateParagraphBulletsRequest {
  createParagraphBullets: {
    range: WireRange;
    bulletPreset: string;
  };
}

/** One entry of a `batchUpdate` request list produced from an {@link Operation}. */
export type DocsRequest =
  | InsertTextRequest
  | UpdateParagraphStyleRequest
  | UpdateTextStyleRequest
  | CreateParagraphBulletsRequest;

function toWireRange(range: Range): WireRange {
  return { startIndex: range.start, endIndex: range.end };
}

/**
 * Serialize a single operation to its `batchUpdate` request object.
 *
 * The field mask of a text style update lists the style's keys in the order
 * they were set, so `{ bold: true }` yields `fields: "bold"`.
 */
export function toRequest(op: Operation): DocsRequest {
  switch (op.type) {
    case 'insertText':
      return {
        insertText: {
          location: { index: op.location.index },
          text: op.text,
        },
      };
    case 'setParagraphStyle':
      return {
        updateParagraphStyle: {
          range: toWireRange(op.range),
          paragraphStyle: { namedStyleType: op.styleName },
          fields: 'namedStyleType',
        },
      };
    case 'setTextStyle':
      return {
        updateTextStyle: {
          range: toWireRange(op.range),
          textStyle: { ...op.style },
          fields: Object.keys(op.style).join(','),
        },
      };
    case 'applyListBullets':
      return {
        createParagraphBullets: {
          range: toWireRange(op.range),
          bulletPreset: op.presetName,
        },
      };
  }
}

/** Serialize operations in order. */
export function toRequests(ops: readonly Operation[]): DocsRequest[] {
  return ops.map(toRequest);
}

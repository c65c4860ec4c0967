/**
 * Parse Stage Types
 */

export const UNKNOWN_TITLE = 'Unknown Title';
export const UNKNOWN_DATE = 'Unknown Date';

/**
 * One parsed input file. Immutable once produced.
 */
export interface SourceDocument {
  readonly identifier: string;
  readonly title: string;
  readonly dateText: string;
  readonly year: number | null;
  readonly body: string;
  readonly persons: readonly string[];
}

export interface XmlElement {
  readonly type: 'element';
  readonly name: string;
  readonly children: readonly XmlNode[];
}

export interface XmlText {
  readonly type: 'text';
  readonly text: string;
}

export type XmlNode = XmlElement | XmlText;

/**
 * XML-TEI document extraction.
 * Pure functions: a string in, a SourceDocument (or a ParseError) out.
 */

import { fail, succeed, toError, type Outcome } from '../../../common/errors';
import {
  descendants,
  findFirst,
  innerText,
  readXmlRoot,
} from './tei-xml.reader';
import { ParseError, ParseErrorType } from './errors/parse-errors';
import {
  UNKNOWN_DATE,
  UNKNOWN_TITLE,
  type SourceDocument,
  type XmlElement,
} from './types';

const YEAR_PATTERN = /\b(19\d{2}|20\d{2})\b/;

export const PERSONS_LABEL = 'Personnes mentionnées: ';

/**
 * First 4-digit year between 1900 and 2099 found in the text.
 */
export function extractYear(dateText: string): number | null {
  const match = YEAR_PATTERN.exec(dateText);
  return match ? Number.parseInt(match[1], 10) : null;
}

export function documentHeader(title: string, dateText: string): string {
  return `Document: ${title} | Date: ${dateText}\n\n`;
}

function trimmedText(element: XmlElement | undefined): string | undefined {
  if (!element) {
    return undefined;
  }
  const text = innerText(element).trim();
  return text.length > 0 ? text : undefined;
}

function nonEmptyTexts(elements: readonly XmlElement[]): string[] {
  return elements
    .map((element) => innerText(element).trim())
    .filter((text) => text.length > 0);
}

export function extractSourceDocument(
  root: XmlElement,
  identifier: string,
): SourceDocument {
  const title =
    trimmedText(findFirst(root, ['titleStmt', 'title'])) ?? UNKNOWN_TITLE;

  // <date> inside the source description paragraph, else the paragraph itself
  const dateText =
    trimmedText(findFirst(root, ['sourceDesc', 'p', 'date'])) ??
    trimmedText(findFirst(root, ['sourceDesc', 'p'])) ??
    UNKNOWN_DATE;

  const paragraphs = nonEmptyTexts(descendants(root, 'p'));
  const persons = nonEmptyTexts(descendants(root, 'persName'));

  let body = documentHeader(title, dateText) + paragraphs.join('\n');
  if (persons.length > 0) {
    body += `\n\n${PERSONS_LABEL}${persons.join(', ')}`;
  }

  return {
    identifier,
    title,
    dateText,
    year: extractYear(dateText),
    body,
    persons,
  };
}

/**
 * Parse one XML-TEI document held in memory.
 */
export function parseTeiDocument(
  xml: string,
  identifier: string,
): Outcome<SourceDocument, ParseError> {
  try {
    const root = readXmlRoot(xml, identifier);
    return succeed(extractSourceDocument(root, identifier));
  } catch (error) {
    if (error instanceof ParseError) {
      return fail(error);
    }
    const cause = toError(error);
    return fail(
      new ParseError(
        ParseErrorType.MALFORMED_XML,
        identifier,
        `Error parsing XML file ${identifier}: ${cause.message}`,
        cause,
      ),
    );
  }
}

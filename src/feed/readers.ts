/**
 * Feed file readers.
 *
 * CSV exports (header row: title, pubDate, guid, link, description) and
 * RSS 2.0 snapshots. Rows missing a required field are dropped.
 */

import { parse as parseCsv } from 'csv-parse/sync';
import { XMLParser } from 'fast-xml-parser';
import { z } from 'zod';
import type { RawFeedRecord } from './records.js';

const text = z
  .union([z.string(), z.number()])
  .transform((value) => String(value).trim());

const recordSchema = z.object({
  guid: text.pipe(z.string().min(1)),
  title: text.pipe(z.string().min(1)),
  description: text.optional().transform((value) => value ?? ''),
  pubDate: text,
  link: text.pipe(z.string().min(1)),
});

export interface ReadResult {
  records: RawFeedRecord[];
  /** Rows dropped for missing or malformed fields */
  rejected: number;
}

function validateRows(rows: unknown[]): ReadResult {
  const records: RawFeedRecord[] = [];
  let rejected = 0;

  for (const row of rows) {
    const result = recordSchema.safeParse(row);
    if (result.success) {
      records.push(result.data);
    } else {
      rejected++;
    }
  }

  return { records, rejected };
}

/**
 * Read CSV content with a header row.
 */
export function readCsvRecords(content: string): ReadResult {
  const rows: unknown = parseCsv(content, {
    columns: true,
    skip_empty_lines: true,
    relax_column_count: true,
    bom: true,
  });
  return validateRows(Array.isArray(rows) ? rows : []);
}

const rssSchema = z.object({
  rss: z.object({
    channel: z.object({
      item: z.union([z.array(z.unknown()), z.unknown()]).optional(),
    }),
  }),
});

/**
 * Read the <item> elements of an RSS 2.0 document.
 *
 * @throws ZodError when the document is not RSS
 */
export function readRssRecords(content: string): ReadResult {
  const parser = new XMLParser({
    ignoreAttributes: true,
    parseTagValue: false,
    trimValues: true,
    processEntities: true,
  });
  const document = rssSchema.parse(parser.parse(content));

  const items = document.rss.channel.item;
  if (items === undefined) {
    return { records: [], rejected: 0 };
  }
  return validateRows(Array.isArray(items) ? items : [items]);
}

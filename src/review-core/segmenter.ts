// src/review-core/segmenter.ts
// Splits a raw transcript into fence-delimited records.
//
// Layout of one record:
//
//   <fence>          opens the record
//   <blank lines>    skipped
//   <header line>
//   <ignored lines>
//   <fence>          header/body divider
//   <body lines>
//   <fence>          closes the record and opens the next one

export interface RawRecord {
  header: string;
  body: string[];
  /** 1-based line number of the header line. */
  line: number;
}

export type FencePredicate = (line: string) => boolean;

export function splitLines(text: string): string[] {
  if (text === '') return [];
  const lines = text.split(/\r\n|\r|\n/);
  if (lines[lines.length - 1] === '') lines.pop();
  return lines;
}

/** The pattern has to cover the whole line, whatever anchors the caller wrote. */
export function compileFence(pattern: string): FencePredicate {
  const re = new RegExp(`^(?:${pattern})$`);
  return (line) => re.test(line);
}

export function segmentRecords(text: string, isFence: FencePredicate): RawRecord[] {
  const lines = splitLines(text);
  const records: RawRecord[] = [];
  let i = 0;

  while (i < lines.length) {
    if (!isFence(lines[i])) {
      i += 1;
      continue;
    }

    i += 1;
    while (i < lines.length && lines[i].trim() === '') i += 1;
    if (i >= lines.length) break;

    const headerIndex = i;
    i += 1;

    while (i < lines.length && !isFence(lines[i])) i += 1;
    if (i >= lines.length) break;

    i += 1;
    const bodyStart = i;
    while (i < lines.length && !isFence(lines[i])) i += 1;
    // no closing fence: trailing partial record
    if (i >= lines.length) break;

    records.push({
      header: lines[headerIndex],
      body: lines.slice(bodyStart, i),
      line: headerIndex + 1,
    });
  }

  return records;
}

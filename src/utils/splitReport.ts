/**
 * Splits a report into parts no longer than `maxLength`, on line boundaries.
 *
 * A single line longer than `maxLength` is cut into slices. Parts are trimmed
 * and empty parts are dropped.
 */
export const splitReport = (report: string, maxLength: number): string[] => {
  const parts: string[] = [];
  let current = "";

  const flush = () => {
    const part = current.trim();
    part && parts.push(part);
    current = "";
  };

  for (const line of report.split("\n")) {
    if (line.length > maxLength) {
      flush();
      for (let i = 0; i < line.length; i += maxLength) {
        current = line.slice(i, i + maxLength);
        flush();
      }
      continue;
    }
    const candidate = current ? `${current}\n${line}` : line;
    if (candidate.length > maxLength) {
      flush();
      current = line;
      continue;
    }
    current = candidate;
  }
  flush();

  return parts;
};

export default splitReport;

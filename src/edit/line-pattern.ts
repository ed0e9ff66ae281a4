import fs from "node:fs/promises";

export interface LinePatternOptions {
  /** Append the replacement of every pattern that matched no line. */
  appendNonMatches?: boolean;
}

/**
 * Regex substitution over each line of a file. `subs` maps a pattern to its
 * replacement (`$1` style back-references); every occurrence on a matching
 * line is replaced. Patterns see the line without its newline, so `$` anchors
 * at end of line.
 */
export async function reEditInPlace(file: string, subs: Record<string, string>, options: LinePatternOptions = {}): Promise<void> {
  const content = await fs.readFile(file, "utf-8");
  const patterns = Object.entries(subs).map(([pattern, replacement]) => ({
    pattern,
    test: new RegExp(pattern),
    global: new RegExp(pattern, "g"),
    replacement,
  }));
  const matched = new Set<string>();

  const lines = content.split(/(?<=\n)/);
  const output: string[] = [];
  for (const rawLine of lines) {
    const newline = rawLine.endsWith("\n") ? "\n" : "";
    let line = newline ? rawLine.slice(0, -1) : rawLine;
    for (const p of patterns) {
      if (p.test.test(line)) {
        matched.add(p.pattern);
        line = line.replace(p.global, p.replacement);
      }
    }
    output.push(line + newline);
  }

  if (options.appendNonMatches) {
    const missing = patterns.filter((p) => !matched.has(p.pattern));
    if (missing.length > 0) {
      if (output.length > 0 && !output[output.length - 1].endsWith("\n")) output.push("\n");
      for (const p of missing) output.push(`${p.replacement}\n`);
    }
  }

  await fs.writeFile(file, output.join(""), "utf-8");
}

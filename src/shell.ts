export function shQuote(arg: string): string {
  // Safe for bash/sh. We don't try to be clever: always quote when needed.
  if (/^[A-Za-z0-9_/:=.,+@%-]+$/.test(arg)) return arg;
  return `'${arg.replace(/'/g, `'\"'\"'`)}'`;
}

export function shJoin(args: string[]): string {
  return args.map(shQuote).join(" ");
}

/**
 * Splits a command line into words, honouring single quotes, double quotes and
 * backslash escapes. No expansion of any kind is performed.
 */
export function shSplit(line: string): string[] {
  const words: string[] = [];
  let current = "";
  let inWord = false;
  let quote: "'" | '"' | null = null;

  for (let i = 0; i < line.length; i++) {
    const ch = line.charAt(i);

    if (quote === "'") {
      if (ch === "'") quote = null;
      else current += ch;
      continue;
    }

    if (quote === '"') {
      if (ch === '"') quote = null;
      else if (ch === "\\" && i + 1 < line.length && /["\\$`]/.test(line.charAt(i + 1))) current += line.charAt(++i);
      else current += ch;
      continue;
    }

    if (/\s/.test(ch)) {
      if (inWord) words.push(current);
      current = "";
      inWord = false;
      continue;
    }

    inWord = true;
    if (ch === "'" || ch === '"') quote = ch;
    else if (ch === "\\" && i + 1 < line.length) current += line.charAt(++i);
    else current += ch;
  }

  if (quote) throw new Error(`Unterminated ${quote} in command: ${line}`);
  if (inWord) words.push(current);
  return words;
}

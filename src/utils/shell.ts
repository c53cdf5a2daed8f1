/**
 * POSIX shell quoting for reconstructed command lines
 */

const SAFE_WORD = /^[A-Za-z0-9_\-.,:/@%+=]+$/;

export function shellQuote(value: string): string {
  if (value === "") return "''";
  if (SAFE_WORD.test(value)) return value;
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/**
 * Split a command line into words, honouring single quotes, double quotes
 * and backslash escapes. Throws on an unterminated quote.
 */
export function splitShellWords(command: string): string[] {
  const words: string[] = [];
  let current = "";
  let inWord = false;
  let i = 0;

  while (i < command.length) {
    const ch = command.charAt(i);

    if (ch === "'") {
      const end = command.indexOf("'", i + 1);
      if (end === -1) throw new Error("Unterminated single quote");
      current += command.slice(i + 1, end);
      inWord = true;
      i = end + 1;
      continue;
    }

    if (ch === '"') {
      i++;
      let closed = false;
      while (i < command.length) {
        const c = command.charAt(i);
        if (c === '"') {
          closed = true;
          i++;
          break;
        }
        if (c === "\\" && i + 1 < command.length && '"\\$`'.includes(command.charAt(i + 1))) {
          current += command.charAt(i + 1);
          i += 2;
          continue;
        }
        current += c;
        i++;
      }
      if (!closed) throw new Error("Unterminated double quote");
      inWord = true;
      continue;
    }

    if (ch === "\\" && i + 1 < command.length) {
      current += command.charAt(i + 1);
      inWord = true;
      i += 2;
      continue;
    }

    if (/\s/.test(ch)) {
      if (inWord) {
        words.push(current);
        current = "";
        inWord = false;
      }
      i++;
      continue;
    }

    current += ch;
    inWord = true;
    i++;
  }

  if (inWord) words.push(current);
  return words;
}

/**
 * Whether a command line carries a long option, as `--flag value` or `--flag=value`
 */
export function hasLongOption(command: string, option: string): boolean {
  let words: string[];
  try {
    words = splitShellWords(command);
  } catch {
    return command.includes(option);
  }
  return words.some((word) => word === option || word.startsWith(`${option}=`));
}

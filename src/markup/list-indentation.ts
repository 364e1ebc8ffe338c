/**
 * List indentation conventions
 *
 * Author markdown nests lists with 4 spaces per level. A list line's depth
 * is floor(indent / 4), so a 2-space indent stays at the parent level; that
 * is a known limitation of the author format.
 */

const LIST_LINE = /^([ \t]*)([-*+]|\d{1,9}[.)])([ \t]+|$)/;
const FENCE_LINE = /^\s*(`{3,}|~{3,})/;

export const INDENT_WIDTH = 4;

function indentWidth(indent: string): number {
  let width = 0;
  for (const ch of indent) {
    width += ch === '\t' ? INDENT_WIDTH : 1;
  }
  return width;
}

/**
 * Apply `transform` to every line outside fenced code blocks.
 */
function mapOutsideFences(markdown: string, transform: (line: string) => string): string {
  let fence: string | undefined;
  return markdown
    .split('\n')
    .map(line => {
      const fenceMatch = FENCE_LINE.exec(line);
      if (fenceMatch) {
        const marker = fenceMatch[1];
        if (fence === undefined) {
          fence = marker[0];
        } else if (marker[0] === fence) {
          fence = undefined;
        }
        return line;
      }
      return fence === undefined ? transform(line) : line;
    })
    .join('\n');
}

/**
 * Re-indent list lines of author markdown to depth * 4 spaces before the
 * markdown pass. Depth never jumps more than one level at a time.
 */
export function normalizeListIndentForRender(markdown: string): string {
  let previousDepth = -1;
  return mapOutsideFences(markdown, line => {
    const match = LIST_LINE.exec(line);
    if (!match) {
      if (line.trim() !== '' && !/^\s/.test(line)) {
        previousDepth = -1;
      }
      return line;
    }
    const depth = Math.min(Math.floor(indentWidth(match[1]) / INDENT_WIDTH), previousDepth + 1);
    previousDepth = depth;
    return ' '.repeat(depth * INDENT_WIDTH) + line.slice(match[1].length);
  });
}

/**
 * Normalize converter output: single space after list markers and nesting
 * re-leveled from relative indentation to 4 spaces per level.
 */
export function normalizeListIndentFromConverter(markdown: string): string {
  let stack: number[] = [];
  return mapOutsideFences(markdown, line => {
    const match = LIST_LINE.exec(line);
    if (!match) {
      if (line.trim() !== '' && !/^\s/.test(line)) {
        stack = [];
      }
      return line;
    }

    const width = indentWidth(match[1]);
    while (stack.length > 0 && width < stack[stack.length - 1]) {
      stack.pop();
    }
    if (stack.length === 0 || width > stack[stack.length - 1]) {
      stack.push(width);
    }
    const depth = stack.length - 1;
    const rest = line.slice(match[0].length);
    const spacer = rest === '' ? '' : ' ';
    return `${' '.repeat(depth * INDENT_WIDTH)}${match[2]}${spacer}${rest}`;
  });
}

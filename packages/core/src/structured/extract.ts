// ============================================
// JSON Extraction
// ============================================

const JSON_FENCE = /```json[^\S\n]*\n?([\s\S]*?)```/i;
const ANY_FENCE = /```[a-z]*[^\S\n]*\n?([\s\S]*?)```/i;

/**
 * Pull the JSON payload out of a model reply.
 *
 * Order: a ```` ```json ```` fence, then any fence whose body is a JSON
 * object or array, then the first balanced object or array in the text.
 *
 * @returns the candidate JSON text, or `undefined` when the reply holds none
 *
 * @example
 * ```typescript
 * extractJson('Sure! {"answer": 42} Hope that helps.'); // '{"answer": 42}'
 * ```
 */
export function extractJson(text: string): string | undefined {
  const fenced = JSON_FENCE.exec(text)?.[1];
  if (fenced !== undefined) {
    return fenced.trim();
  }

  const anyFence = ANY_FENCE.exec(text)?.[1]?.trim();
  if (anyFence !== undefined && (anyFence.startsWith("{") || anyFence.startsWith("["))) {
    return anyFence;
  }

  return extractBalanced(text);
}

/**
 * Find the first balanced JSON object or array using bracket-depth
 * tracking that ignores brackets inside strings.
 */
export function extractBalanced(text: string, startFrom = 0): string | undefined {
  for (let start = startFrom; start < text.length; start++) {
    const open = text[start];
    if (open !== "{" && open !== "[") continue;

    const end = findClose(text, start);
    if (end !== undefined) {
      return text.slice(start, end + 1);
    }
  }
  return undefined;
}

function findClose(text: string, start: number): number | undefined {
  const expected: string[] = [];
  let inString = false;
  let escape = false;

  for (let i = start; i < text.length; i++) {
    const char = text.charAt(i);

    if (inString) {
      if (escape) {
        escape = false;
      } else if (char === "\\") {
        escape = true;
      } else if (char === '"') {
        inString = false;
      }
      continue;
    }

    if (char === '"') {
      inString = true;
    } else if (char === "{" || char === "[") {
      expected.push(char === "{" ? "}" : "]");
    } else if (char === "}" || char === "]") {
      if (expected.pop() !== char) {
        return undefined;
      }
      if (expected.length === 0) {
        return i;
      }
    }
  }

  return undefined;
}

import _Ajv from 'ajv';
import type { ErrorObject, ValidateFunction } from 'ajv';

const Ajv = _Ajv.default;

/**
 * JSON Schema Validator
 *
 * Validates gold datasets against their declared schema, plus helpers
 * for pulling JSON out of raw model output.
 */

const ajv = new Ajv({
  allErrors: true,
  verbose: true,
  strict: false, // Allow additional properties
});

/**
 * Validator class for JSON schema validation
 */
export class SchemaValidator {
  /**
   * Compile a schema into a type guard. Ajv caches compilation per
   * schema object, so repeated calls are cheap.
   */
  compileSchema<T>(schema: object): ValidateFunction<T> {
    return ajv.compile<T>(schema);
  }

  /**
   * Format validation errors as a readable string
   */
  formatErrors(errors?: ErrorObject[] | null, limit = 10): string {
    if (!errors || errors.length === 0) {
      return 'No errors';
    }

    const lines = errors.slice(0, limit).map((error) => {
      const path = error.instancePath || 'root';
      const message = error.message || 'validation failed';
      const params = JSON.stringify(error.params);
      return `  • ${path}: ${message} ${params}`;
    });
    if (errors.length > limit) {
      lines.push(`  … and ${errors.length - limit} more`);
    }
    return lines.join('\n');
  }
}

/**
 * Global validator instance
 */
export const validator = new SchemaValidator();

/**
 * Return the contents of the last <final>...</final> block, or the whole
 * text when there is none.
 */
export function extractFinalBlock(content: string): string {
  const blocks = [...content.matchAll(/<final>([\s\S]*?)<\/final>/gi)];
  if (blocks.length === 0) {
    return content;
  }
  return blocks[blocks.length - 1][1];
}

/**
 * Remove a surrounding ``` / ```json fence
 */
export function stripCodeFence(content: string): string {
  const fenced = content.trim().match(/^```[a-zA-Z]*\s*([\s\S]*?)\s*```$/);
  return fenced ? fenced[1] : content.trim();
}

/**
 * Extract and parse JSON content from model response
 * Handles <final> blocks, markdown code fences and prose around the JSON.
 */
export function extractJsonFromResponse(content: string): unknown {
  const body = stripCodeFence(extractFinalBlock(content));

  try {
    return JSON.parse(body);
  } catch {
    // Slice from the first opening bracket to the last closing one
    const start = body.search(/[[{]/);
    const end = Math.max(body.lastIndexOf(']'), body.lastIndexOf('}'));
    if (start >= 0 && end > start) {
      try {
        return JSON.parse(body.slice(start, end + 1));
      } catch {
        // Fall through
      }
    }

    throw new Error('Could not extract valid JSON from response content');
  }
}

/**
 * Non-throwing variant: null when no JSON can be recovered
 */
export function parsePredictionText(content: string): unknown {
  try {
    return extractJsonFromResponse(content);
  } catch {
    return null;
  }
}

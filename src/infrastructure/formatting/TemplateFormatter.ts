import { inspect } from 'node:util';
import { FormatError } from '../../domain/errors/FormatError.js';
import type { Displayable } from '../../domain/entities/Template.js';

type Align = '<' | '>' | '^';

type Presentation = 's' | 'd' | 'x' | 'X' | 'b' | 'o' | 'f' | 'e' | '?';

/**
 * Parsed `{[index][:spec]}` replacement field
 */
interface FieldSpec {
  fill: string;
  align: Align | null;
  zero: boolean;
  width: number | null;
  precision: number | null;
  type: Presentation | null;
}

// [[fill]align][0][width][.precision][type]
const SPEC_PATTERN = /^(?:(.)?([<>^]))?(0)?(\d+)?(?:\.(\d+))?([sdxXbofe?])?$/;

// toFixed/toExponential accept at most 100 digits
const MAX_PRECISION = 100;
const MAX_WIDTH = 1024;

const INTEGER_TYPES: ReadonlySet<Presentation> = new Set(['d', 'x', 'X', 'b', 'o']);
const RADIX: Partial<Record<Presentation, number>> = { d: 10, x: 16, X: 16, b: 2, o: 8 };

function parseSpec(template: string, spec: string): FieldSpec {
  const match = SPEC_PATTERN.exec(spec);
  if (!match) {
    throw new FormatError(template, `malformed format directive ':${spec}'`);
  }
  const [, fill, align, zero, width, precision, type] = match;
  const parsed: FieldSpec = {
    fill: fill ?? ' ',
    align: align === '<' || align === '>' || align === '^' ? align : null,
    zero: zero !== undefined,
    width: width !== undefined ? parseInt(width, 10) : null,
    precision: precision !== undefined ? parseInt(precision, 10) : null,
    type: type !== undefined && isPresentation(type) ? type : null,
  };

  if (parsed.width !== null && parsed.width > MAX_WIDTH) {
    throw new FormatError(template, `width ${parsed.width} exceeds ${MAX_WIDTH}`);
  }
  if (parsed.precision !== null && parsed.precision > MAX_PRECISION) {
    throw new FormatError(template, `precision ${parsed.precision} exceeds ${MAX_PRECISION}`);
  }
  return parsed;
}

function isPresentation(value: string): value is Presentation {
  return 'sdxXbofe?'.includes(value);
}

function hasOwnToString(value: object): boolean {
  return 'toString' in value && typeof value.toString === 'function' && value.toString !== Object.prototype.toString;
}

function renderDefault(value: Displayable): string {
  if (typeof value === 'string') return value;
  if (value instanceof Error) return value.stack ?? `${value.name}: ${value.message}`;
  if (value instanceof Date) return value.toISOString();
  if (typeof value === 'object' && value !== null) {
    if (!Array.isArray(value) && hasOwnToString(value)) return String(value);
    return inspect(value, { breakLength: Infinity, depth: 4 });
  }
  return String(value);
}

function renderInteger(template: string, value: Displayable, type: Presentation): string {
  const radix = RADIX[type] ?? 10;
  let digits: string;
  if (typeof value === 'bigint') {
    digits = value.toString(radix);
  } else if (typeof value === 'number' && Number.isInteger(value)) {
    digits = value.toString(radix);
  } else {
    throw new FormatError(template, `directive '${type}' requires an integer, got ${describe(value)}`);
  }
  return type === 'X' ? digits.toUpperCase() : digits;
}

// 1.5e+4 -> 1.5e+04
function padExponent(text: string): string {
  return text.replace(/e([+-])(\d)$/, 'e$10$2');
}

function renderFloat(template: string, value: Displayable, type: Presentation, precision: number | null): string {
  if (typeof value !== 'number') {
    throw new FormatError(template, `directive '${type}' requires a number, got ${describe(value)}`);
  }
  return type === 'f' ? value.toFixed(precision ?? 6) : padExponent(value.toExponential(precision ?? 6));
}

function describe(value: Displayable): string {
  if (value === null) return 'null';
  if (value instanceof Date) return 'Date';
  return typeof value;
}

function applyWidth(text: string, spec: FieldSpec, numeric: boolean): string {
  const length = [...text].length;
  if (spec.width === null || length >= spec.width) return text;
  const padding = spec.width - length;

  // zero padding goes after the sign and yields to an explicit alignment
  if (spec.zero && spec.align === null) {
    const sign = text.startsWith('-') || text.startsWith('+') ? text[0] : '';
    return sign + '0'.repeat(padding) + text.slice(sign.length);
  }

  const align = spec.align ?? (numeric ? '>' : '<');
  if (align === '<') return text + spec.fill.repeat(padding);
  if (align === '>') return spec.fill.repeat(padding) + text;
  const left = Math.floor(padding / 2);
  return spec.fill.repeat(left) + text + spec.fill.repeat(padding - left);
}

function checkPrecision(template: string, value: Displayable, type: Presentation | null): void {
  if (type !== null && (INTEGER_TYPES.has(type) || type === '?')) {
    throw new FormatError(template, `precision is not allowed with directive '${type}'`);
  }
  if (typeof value !== 'string' && typeof value !== 'number') {
    throw new FormatError(template, `precision requires a string or number, got ${describe(value)}`);
  }
}

function renderField(template: string, value: Displayable, spec: FieldSpec): string {
  const { type } = spec;
  const numeric = typeof value === 'number' || typeof value === 'bigint';

  if (spec.precision !== null) {
    checkPrecision(template, value, type);
  }
  if (spec.zero && (!numeric || type === 's' || type === '?')) {
    throw new FormatError(template, `zero padding requires a number, got ${describe(value)}`);
  }

  let text: string;
  if (type !== null && INTEGER_TYPES.has(type)) {
    text = renderInteger(template, value, type);
  } else if (type === 'f' || type === 'e') {
    text = renderFloat(template, value, type, spec.precision);
  } else if (type === '?') {
    text = inspect(value, { breakLength: Infinity, depth: 4 });
  } else {
    if (type === 's' && typeof value !== 'string') {
      throw new FormatError(template, `directive 's' requires a string, got ${describe(value)}`);
    }
    text = renderDefault(value);
    if (spec.precision !== null) {
      text = typeof value === 'number' ? value.toFixed(spec.precision) : [...text].slice(0, spec.precision).join('');
    }
  }

  return applyWidth(text, spec, numeric);
}

/**
 * Render a brace template.
 *
 * Fields are `{}` (next argument), `{N}` (argument N) or either followed by
 * `:[[fill]align][0][width][.precision][type]`. `{{` and `}}` are literal braces.
 * Every argument must be consumed; mixing automatic and manual indices is rejected.
 *
 * @throws FormatError when the template does not match the arguments
 */
export function formatTemplate(template: string, args: readonly Displayable[]): string {
  let out = '';
  let nextAuto = 0;
  let mode: 'auto' | 'manual' | null = null;
  const used = new Set<number>();
  let i = 0;

  while (i < template.length) {
    const ch = template[i];

    if (ch === '}') {
      if (template[i + 1] === '}') {
        out += '}';
        i += 2;
        continue;
      }
      throw new FormatError(template, `unmatched '}' at offset ${i}`);
    }

    if (ch !== '{') {
      out += ch;
      i += 1;
      continue;
    }

    if (template[i + 1] === '{') {
      out += '{';
      i += 2;
      continue;
    }

    const close = template.indexOf('}', i + 1);
    if (close === -1) {
      throw new FormatError(template, `unmatched '{' at offset ${i}`);
    }

    const body = template.slice(i + 1, close);
    const colon = body.indexOf(':');
    const indexPart = colon === -1 ? body : body.slice(0, colon);
    const spec = parseSpec(template, colon === -1 ? '' : body.slice(colon + 1));

    let index: number;
    if (indexPart === '') {
      if (mode === 'manual') {
        throw new FormatError(template, 'cannot mix automatic and manual field numbering');
      }
      mode = 'auto';
      index = nextAuto++;
    } else if (/^\d+$/.test(indexPart)) {
      if (mode === 'auto') {
        throw new FormatError(template, 'cannot mix automatic and manual field numbering');
      }
      mode = 'manual';
      index = parseInt(indexPart, 10);
    } else {
      throw new FormatError(template, `invalid field '{${body}}'`);
    }

    if (index >= args.length) {
      throw new FormatError(
        template,
        `field ${index} references a missing argument (${args.length} supplied)`
      );
    }

    used.add(index);
    out += renderField(template, args[index], spec);
    i = close + 1;
  }

  if (used.size < args.length) {
    throw new FormatError(
      template,
      `${args.length - used.size} of ${args.length} argument(s) not referenced`
    );
  }

  return out;
}

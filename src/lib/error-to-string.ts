import stringWidth from 'string-width';
import { EOL } from './constants';

type Row = [label: string, value: string];

function safeStringify(value: unknown): string {
  switch (typeof value) {
    case 'string':
      return value;
    case 'function':
      return '[Function]';
    case 'object':
      if (value === null) {
        return 'null';
      }

      if (value instanceof Error) {
        return `${value.name}: ${value.message}`;
      }

      try {
        return JSON.stringify(value);
      } catch {
        return '[Unserializable]';
      }
    default:
      return String(value);
  }
}

function collectRows(error: object): Row[] {
  const rows: Row[] = [];
  const fields: Array<[key: string, label: string]> = [
    ['message', 'Message'],
    ['name', 'Name'],
    ['code', 'Code'],
    ['errPrefix', 'Prefix'],
    ['errType', 'errType'],
    ['errCode', 'errCode'],
  ];

  for (const [key, label] of fields) {
    const value: unknown = Reflect.get(error, key);

    if (value !== undefined && value !== null && value !== '') {
      rows.push([label, safeStringify(value)]);
    }
  }

  const additionalInfo: unknown = Reflect.get(error, 'additionalInfo');

  if (additionalInfo && typeof additionalInfo === 'object') {
    for (const [key, value] of Object.entries(additionalInfo)) {
      rows.push([`AdditionalInfo.${key}`, safeStringify(value)]);
    }
  }

  const cause: unknown = Reflect.get(error, 'cause');

  if (cause !== undefined) {
    rows.push(['Cause', safeStringify(cause)]);
  }

  return rows;
}

/**
 * Render an error as an aligned key/value block for log output.
 *
 * Picks up the conventional fields (`message`, `name`, `code`) and the
 * `errPrefix` / `errType` / `errCode` / `additionalInfo` fields carried by
 * this library's error classes. The stack, when present and requested, is
 * appended after a blank line.
 */
export function errorToString(
  error: unknown,
  options: { includeStack?: boolean } = {},
): string {
  if (!error || typeof error !== 'object') {
    return safeStringify(error);
  }

  const rows = collectRows(error);
  const labelWidth = Math.max(0, ...rows.map(([label]) => stringWidth(label)));

  const lines = rows.map(
    ([label, value]) =>
      label + ' '.repeat(labelWidth - stringWidth(label) + 2) + value,
  );

  const stack: unknown = Reflect.get(error, 'stack');

  if (options.includeStack !== false && typeof stack === 'string') {
    lines.push('', stack);
  }

  return lines.join(EOL);
}

/**
 * A telemetry value whose JSON type is only known at run time.
 *
 * Decoding never fails: numbers become `numeric`, strings become `textual`
 * and anything else (objects, arrays, booleans, null, absent) is `unrecognized`.
 */
export type DynamicValue =
  | { kind: 'numeric'; value: number }
  | { kind: 'textual'; value: string }
  | { kind: 'unrecognized' };

export function decodeDynamicValue(raw: unknown): DynamicValue {
  if (typeof raw === 'number' && Number.isFinite(raw)) {
    return { kind: 'numeric', value: raw };
  }
  if (typeof raw === 'string') {
    return { kind: 'textual', value: raw };
  }
  return { kind: 'unrecognized' };
}

export function encodeDynamicValue(value: DynamicValue): number | string | null {
  switch (value.kind) {
    case 'numeric':
    case 'textual':
      return value.value;
    case 'unrecognized':
      return null;
  }
}

export function asNumber(value: DynamicValue): number | undefined {
  return value.kind === 'numeric' ? value.value : undefined;
}

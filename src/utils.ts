export function assertNever(x: never, msg?: string): never {
  throw new Error(msg ?? `value ${String(x)} should be impossible`);
}


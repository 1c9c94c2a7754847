function randomSuffix(length: number): string {
  let out = "";
  while (out.length < length) {
    out += Math.random().toString(36).slice(2);
  }
  return out.slice(0, length);
}

export function generateId(prefix: string, length = 24): string {
  return `${prefix}${randomSuffix(length)}`;
}

export function getCurrentTimestamp(): number {
  return Math.floor(Date.now() / 1000);
}

/** `cmd pos --flag value --switch` → Map. 위치 인자는 _command, _file 순서 */
export function parseArgs(args: string[]): Map<string, string> {
  const map = new Map<string, string>();
  for (let i = 0; i < args.length; i++) {
    const arg = args[i]!;
    if (arg.startsWith('--')) {
      const next = args[i + 1];
      if (next && !next.startsWith('--')) {
        map.set(arg, next);
        i++;
      } else {
        map.set(arg, 'true');
      }
    } else if (!map.has('_command')) {
      map.set('_command', arg);
    } else if (!map.has('_file')) {
      map.set('_file', arg);
    }
  }
  return map;
}

export function getNum(args: Map<string, string>, key: string, def: number): number {
  const v = args.get(key);
  if (!v) return def;
  const n = Number(v);
  return Number.isFinite(n) ? n : def;
}

export function requireArg(args: Map<string, string>, key: string): string {
  const v = args.get(key);
  if (!v || v === 'true') {
    throw new Error(`Missing required option ${key}`);
  }
  return v;
}

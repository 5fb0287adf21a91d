let sequence = 0;

export function createConnectionId(now: number = Date.now()): string {
  sequence += 1;
  return `conn_${now}_${sequence}`;
}

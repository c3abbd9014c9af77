// cuid-like IDs: time-ordered prefix plus a random tail
export function generateId(): string {
  const timestamp = Date.now().toString(36);
  const randomPart = Math.random().toString(36).substring(2, 9);
  return `c${timestamp}${randomPart}`;
}

export type IdGenerator = () => string;

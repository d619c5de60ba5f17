export function stripCodeFences(text: string): string {
  const t = text.trim();
  const fenced = t.match(/```(?:\w+)?\s*([\s\S]*?)\s*```/i);
  return (fenced?.[1] ?? t).trim();
}

export function truncate(s: string, maxChars: number): string {
  if (s.length <= maxChars) return s;
  return `${s.slice(0, maxChars)}…`;
}

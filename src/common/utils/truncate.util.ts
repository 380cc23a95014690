export function truncate(text: string, max = 200): string {
  return text.length > max ? text.slice(0, max) : text;
}

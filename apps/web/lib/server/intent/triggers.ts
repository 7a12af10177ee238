export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export function matchesTrigger(message: string, keywords: string[]): boolean {
  return keywords.some((keyword) =>
    new RegExp(`(^|[^\\w-])${escapeRegExp(keyword)}s?(?![\\w-])`, "i").test(message)
  );
}

export function createRunId(now = new Date()): string {
  const suffix = Math.random().toString(36).slice(2, 8);
  return `collect_${now.toISOString().replace(/[:.]/g, "-")}_${suffix}`;
}

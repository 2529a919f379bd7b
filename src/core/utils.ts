export function isoNow(): string {
  return new Date().toISOString();
}

export function defaultRunId(now: Date = new Date()): string {
  return now.toISOString().replace(/[-:]/g, "").replace(/\.\d+Z$/, "Z");
}

export function slugify(input: string): string {
  return input
    .toLowerCase()
    .trim()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
}

export function toPosixPath(value: string): string {
  return value.split("\\").join("/");
}

export const formatRunTimestamp = (date: Date): string => {
  const iso = date.toISOString();
  return iso.replace("T", "_").replace(/\.\d{3}Z$/, "Z").replace(/:/g, "-");
};

export const slugify = (value: string): string => {
  const ascii = value.normalize("NFKD").replace(/[^\x00-\x7F]/g, "");
  return ascii
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "")
    .replace(/-{2,}/g, "-");
};

export const buildExportName = (params: {
  timestamp: string;
  kind: string;
  subject?: string;
}): string => {
  const parts: string[] = [params.timestamp, slugify(params.kind)];
  const subject = params.subject ? slugify(params.subject) : "";
  if (subject) {
    parts.push(subject);
  }
  return `${parts.join("__")}.csv`;
};

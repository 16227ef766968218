/**
 * Uploaded file names keep letters, digits, `_`, `-` and `.`
 */
export function safeFileName(input: string) {
  return input.replace(/[^a-zA-Z0-9_\-.]/g, "_");
}

export function slugify(text: string) {
  return text
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
}

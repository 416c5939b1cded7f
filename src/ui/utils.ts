// Shared UI utilities

export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

export function formatPercent(value: number): string {
  return `${value.toFixed(1)}%`;
}

/** Width of the confidence bar, clamped to 0..100. */
export function progressWidth(confidencePercent: number): string {
  const clamped = Math.max(0, Math.min(100, confidencePercent));
  return `${clamped}%`;
}

/** Client-side pre-check; the server re-validates everything. */
export function checkFile(
  file: { name: string; size: number },
  limits: { maxUploadBytes: number; allowedExtensions: readonly string[] },
): string | null {
  const dot = file.name.lastIndexOf('.');
  const ext = dot >= 0 ? file.name.slice(dot + 1).toLowerCase() : '';
  if (!limits.allowedExtensions.includes(ext)) {
    return `Unsupported file type. Allowed: ${limits.allowedExtensions.join(', ')}`;
  }
  if (file.size > limits.maxUploadBytes) {
    return `File is ${formatBytes(file.size)}; the limit is ${formatBytes(limits.maxUploadBytes)}`;
  }
  return null;
}

export function crashMessage(view: string, error: Error): string {
  return `The ${view} view stopped working: ${error.message || 'unknown error'}`;
}

export const MAX_UPLOAD_BYTES = 200 * 1024 * 1024;
export const MAX_DURATION_SECONDS = 600;
export const ALLOWED_EXTENSIONS = ['mp4', 'mov', 'avi', 'mkv'] as const;
export const ALLOWED_URL_HOSTS = ['loom.com', 'youtube.com', 'youtu.be'] as const;
export const URL_PREFIXES = ['http://', 'https://', 'www.'] as const;

export type AllowedExtension = (typeof ALLOWED_EXTENSIONS)[number];

export function isAllowedExtension(ext: string): ext is AllowedExtension {
  return (ALLOWED_EXTENSIONS as readonly string[]).includes(ext);
}

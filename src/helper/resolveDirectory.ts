import path from 'path';

export function resolveDirectory(configured: string | undefined, fallbackName: string): string {
  return configured ? path.resolve(configured) : path.join(process.cwd(), fallbackName);
}

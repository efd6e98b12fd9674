export interface ErrnoLike {
  readonly code: string;
}

export function hasErrorCode(e: unknown): e is ErrnoLike {
  return typeof e === 'object' && e !== null && 'code' in e && typeof e.code === 'string';
}

export function isEnoent(e: unknown) {
  return hasErrorCode(e) && e.code === 'ENOENT';
}

export function errorWithCode<E extends Error>(code: string | undefined, e: E): E & Partial<ErrnoLike> {
  return code !== undefined ? Object.assign(e, { code }) : e;
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : `${e}`;
}

// === Transform Function ===
// Exposes `id` instead of `_id` and drops the version key in JSON output.
export function transformFn(_doc: unknown, ret: Record<string, unknown>) {
  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  const { _id, __v, ...rest } = ret;
  return _id === undefined ? rest : { id: String(_id), ...rest };
}

export const HTTP_URL = /^https?:\/\/.+/i;

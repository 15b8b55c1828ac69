import type { PendingUpdateRow, UpdateId, UpdateRecord } from '@shared/contracts';

const ID_SEPARATOR = ';';

export function parseUpdateId(id: UpdateId): UpdateRecord {
  const [name = '', version = '', arch = ''] = id.split(ID_SEPARATOR);
  return {
    id,
    name,
    version,
    arch
  };
}

export function toPendingRows(ids: readonly UpdateId[]): PendingUpdateRow[] {
  return ids.map((id) => {
    const record = parseUpdateId(id);
    return {
      name: record.name,
      version: record.version
    };
  });
}

export function uniqueInOrder(ids: readonly UpdateId[]): UpdateId[] {
  const seen = new Set<UpdateId>();
  const result: UpdateId[] = [];
  for (const id of ids) {
    if (seen.has(id)) {
      continue;
    }
    seen.add(id);
    result.push(id);
  }
  return result;
}

import type { Redis } from 'ioredis';
import type { Table } from '../../../shared/logic/index.js';
import { StatePersistenceFailureError } from '../../../shared/logic/index.js';
import { REDIS_KEYS } from '../../../config/redis.js';
import type { TableStateStore } from './TableStateStore.js';
import { tableSchema } from './tableSchema.js';

// KEYS[1] state key, ARGV[1] expected stored version ('' = key must not exist), ARGV[2] new state JSON.
// Returns 1 on write, 0 on version mismatch.
const COMMIT_SCRIPT = `
local current = redis.call('GET', KEYS[1])
if ARGV[1] == '' then
  if current then return 0 end
else
  if not current then return 0 end
  local decoded = cjson.decode(current)
  if tostring(decoded['version']) ~= ARGV[1] then return 0 end
end
redis.call('SET', KEYS[1], ARGV[2])
return 1
`;

export class RedisTableStateStore implements TableStateStore {
  constructor(private redis: Redis) {}

  async loadTableState(tableId: string): Promise<Table | null> {
    const raw = await this.redis.get(REDIS_KEYS.tableState(tableId));
    if (raw === null) return null;

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      throw new StatePersistenceFailureError(`Stored state for table ${tableId} is not JSON`, err);
    }

    const result = tableSchema.safeParse(parsed);
    if (!result.success) {
      console.error(`[Redis] Corrupt state for table ${tableId}:`, result.error.format());
      throw new StatePersistenceFailureError(`Stored state for table ${tableId} is invalid`, result.error);
    }
    return result.data;
  }

  async commitTableState(tableId: string, newState: Table): Promise<void> {
    const expected = newState.version === 0 ? '' : String(newState.version - 1);

    let written: unknown;
    try {
      written = await this.redis.eval(
        COMMIT_SCRIPT,
        1,
        REDIS_KEYS.tableState(tableId),
        expected,
        JSON.stringify(newState)
      );
    } catch (err) {
      throw new StatePersistenceFailureError(`Redis commit failed for table ${tableId}`, err);
    }

    if (written !== 1) {
      throw new StatePersistenceFailureError(
        `Version conflict for table ${tableId}: expected stored version ${expected || 'none'}`
      );
    }
  }
}

import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { Ajv, type ValidateFunction } from 'ajv';
import fg from 'fast-glob';
import type { GuildSnapshot, PlayerSnapshot } from './types/index.js';
import { PayloadValidationError } from './utils/errors.js';
import { isRecord } from './lib/fields.js';

export const defaultSchemaDir = fileURLToPath(new URL('../schemas', import.meta.url));

const GUILD_SCHEMA_ID = 'guild-snapshot';
const PLAYER_SCHEMA_ID = 'player-snapshot';

export interface SnapshotValidator {
  guild(snapshot: GuildSnapshot): void;
  player(snapshot: PlayerSnapshot): void;
}

function check(ajv: Ajv, validator: ValidateFunction, data: unknown, label: string) {
  if (validator(data)) return;
  const issues = (validator.errors ?? []).map((error) =>
    ajv.errorsText([error], { dataVar: label })
  );
  throw new PayloadValidationError(label, issues.length ? issues : ['unknown validation failure']);
}

/** Plain-JSON view of a player snapshot (the unit map becomes a list). */
export function playerRecord(snapshot: PlayerSnapshot): Record<string, unknown> {
  return {
    ...snapshot,
    units: [...snapshot.units.entries()].map(([baseId, tier]) =>
      tier === undefined ? { baseId } : { baseId, tier }
    )
  };
}

// ajv sees the snapshot the way it would be stored: undefined keys dropped.
function toJson(value: object): unknown {
  const copy: unknown = JSON.parse(JSON.stringify(value));
  return copy;
}

const cache = new Map<string, Promise<SnapshotValidator>>();

async function compileValidator(schemaDir: string): Promise<SnapshotValidator> {
  const ajv = new Ajv({ allErrors: true, strict: false });
  const files = await fg('*.json', { cwd: schemaDir, absolute: true });
  for (const file of files.sort()) {
    const schema: unknown = JSON.parse(await readFile(file, 'utf8'));
    if (isRecord(schema)) ajv.addSchema(schema);
  }

  const lookup = (id: string): ValidateFunction => {
    const validator = ajv.getSchema(id);
    if (!validator) {
      throw new Error(`Schema ${id} not found under ${schemaDir}`);
    }
    return validator;
  };
  const guildValidator = lookup(GUILD_SCHEMA_ID);
  const playerValidator = lookup(PLAYER_SCHEMA_ID);

  return {
    guild: (snapshot) => check(ajv, guildValidator, toJson(snapshot), 'guild'),
    player: (snapshot) => check(ajv, playerValidator, toJson(playerRecord(snapshot)), 'player')
  };
}

export function loadSnapshotValidator(schemaDir: string = defaultSchemaDir): Promise<SnapshotValidator> {
  let pending = cache.get(schemaDir);
  if (!pending) {
    pending = compileValidator(schemaDir);
    cache.set(schemaDir, pending);
  }
  return pending;
}

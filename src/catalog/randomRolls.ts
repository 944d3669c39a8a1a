/**
 * Random-roll perk resolution
 *
 * Walks item -> socket -> plug set -> plug item to find every perk a weapon
 * can drop with. Only randomized sockets are followed; fixed sockets hold
 * the weapon's static parts (frame, shader, masterwork slot) and never roll.
 */

import type {
  CatalogEntry,
  Hash,
  ItemRecord,
  PlugSetRecord,
  RecordLookup,
} from "@/types/catalog";
import { MissingReferenceError } from "./errors";

/**
 * Resolves the random-roll perk hashes of a single weapon.
 *
 * The result is the union of every randomized socket's reusable plug items,
 * so a plug set shared by two sockets (or a perk present in two plug sets)
 * is counted once. Insertion order follows socket order, then plug order.
 *
 * @param weapon - Weapon item record
 * @param plugSets - Plug set table keyed by hash
 * @returns Deduplicated perk hashes
 * @throws {MissingReferenceError} If a randomized socket points at a plug set
 *   absent from the table. Resolution aborts rather than returning a partial set.
 */
export function resolveWeaponPerkHashes(
  weapon: ItemRecord,
  plugSets: RecordLookup<PlugSetRecord>,
): Set<Hash> {
  const perkHashes = new Set<Hash>();

  weapon.sockets.forEach((socket, socketIndex) => {
    if (socket.kind === "fixed") {
      return;
    }

    const plugSet = plugSets.get(socket.plugSetHash);
    if (!plugSet) {
      throw new MissingReferenceError({
        table: "plugSets",
        missingHash: socket.plugSetHash,
        weaponHash: weapon.hash,
        socketIndex,
      });
    }

    for (const plugItemHash of plugSet.reusablePlugItems) {
      perkHashes.add(plugItemHash);
    }
  });

  return perkHashes;
}

/**
 * Collects the global set of reachable random-roll perks across all weapons.
 *
 * @throws {MissingReferenceError} From the first weapon with a dangling plug set
 */
export function collectRandomRollPerkHashes(
  weapons: readonly ItemRecord[],
  plugSets: RecordLookup<PlugSetRecord>,
): Set<Hash> {
  const allPerkHashes = new Set<Hash>();
  for (const weapon of weapons) {
    for (const perkHash of resolveWeaponPerkHashes(weapon, plugSets)) {
      allPerkHashes.add(perkHash);
    }
  }
  return allPerkHashes;
}

/**
 * Resolves perk hashes back to display names through the item table.
 *
 * Output order follows the input set's order.
 *
 * @throws {MissingReferenceError} If a plug item hash has no item record
 */
export function resolvePerkNames(
  perkHashes: Iterable<Hash>,
  items: RecordLookup<CatalogEntry>,
): CatalogEntry[] {
  const perks: CatalogEntry[] = [];
  for (const hash of perkHashes) {
    const item = items.get(hash);
    if (!item) {
      throw new MissingReferenceError({ table: "items", missingHash: hash });
    }
    perks.push({ hash, name: item.name });
  }
  return perks;
}

/**
 * Inventory vectors, announcing or requesting objects by hash.
 *
 * @packageDocumentation
 */
import type { Sha256dHash } from '../branded.js';
import { mapCodec, u32, type Codec } from '../consensus/codec.js';
import { bytes32, vector } from '../consensus/collections.js';
import { UnknownInventoryTypeError } from '../consensus/errors.js';
import { struct } from '../consensus/struct.js';

export enum InventoryType {
    Error = 0,
    Transaction = 1,
    Block = 2,
    FilteredBlock = 3,
    CompactBlock = 4,
    WitnessTransaction = 0x40000001,
    WitnessBlock = 0x40000002,
    WitnessFilteredBlock = 0x40000003,
}

const INVENTORY_TYPES: readonly InventoryType[] = [
    InventoryType.Error,
    InventoryType.Transaction,
    InventoryType.Block,
    InventoryType.FilteredBlock,
    InventoryType.CompactBlock,
    InventoryType.WitnessTransaction,
    InventoryType.WitnessBlock,
    InventoryType.WitnessFilteredBlock,
];

export const inventoryType: Codec<InventoryType> = mapCodec(
    u32,
    (type: InventoryType): number => type,
    (code) => {
        const type = INVENTORY_TYPES.find((t) => t === code);
        if (type === undefined) throw new UnknownInventoryTypeError(code);
        return type;
    },
);

export interface Inventory {
    type: InventoryType;
    hash: Sha256dHash;
}

export const inventory: Codec<Inventory> = struct<Inventory>({
    type: inventoryType,
    hash: bytes32,
});

export const inventoryList: Codec<Inventory[]> = vector(inventory);

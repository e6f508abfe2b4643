import { OwnershipInvariantViolation, StaleNodeException } from "../data/exception.js";

//----------------------------------------------------------------------------------------------------------------------
// Address of a node within the arena. The generation changes whenever the slot is freed, so that keys to removed
// nodes can be told apart from nodes that later reuse the same slot.
//----------------------------------------------------------------------------------------------------------------------

export interface SlotKey {
    readonly index: number;
    readonly generation: number;
}

interface Entry<T> {
    readonly value: T;
    next?: SlotKey;
    previous?: SlotKey;
    owners: number;
}

interface Slot<T> {
    generation: number;
    entry?: Entry<T>;
}

//----------------------------------------------------------------------------------------------------------------------
// Storage for the nodes of a linked list. Each node counts its owners (links from other nodes, head/tail slots of the
// list and whoever currently holds it during an operation) and is freed when the last owner lets go.
//----------------------------------------------------------------------------------------------------------------------

export class NodeArena<T> {

    private readonly slots = new Array<Slot<T>>();
    private readonly freeSlots = new Array<number>();
    private liveNodes = 0;

    //------------------------------------------------------------------------------------------------------------------
    // Create a new node without links. The caller becomes its only owner.
    //------------------------------------------------------------------------------------------------------------------

    public allocate(value: T): SlotKey {
        const entry: Entry<T> = { value, owners: 1 };
        const index = this.freeSlots.pop();
        this.liveNodes++;
        if (undefined === index) {
            this.slots.push({ generation: 0, entry });
            return { index: this.slots.length - 1, generation: 0 };
        } else {
            const slot = this.slotAt(index);
            slot.entry = entry;
            return { index, generation: slot.generation };
        }
    }

    //------------------------------------------------------------------------------------------------------------------
    // Add or remove an owner
    //------------------------------------------------------------------------------------------------------------------

    public retain(key: SlotKey) {
        this.entry(key).owners++;
        return key;
    }

    public release(key: SlotKey) {
        // Freeing a node releases the nodes it links to (iteratively, chains can be arbitrarily long)
        const pending = [key];
        for (let current = pending.pop(); current; current = pending.pop()) {
            const entry = this.entry(current);
            entry.owners--;
            if (entry.owners <= 0) {
                this.free(current);
                if (entry.next) {
                    pending.push(entry.next);
                }
                if (entry.previous) {
                    pending.push(entry.previous);
                }
            }
        }
    }

    //------------------------------------------------------------------------------------------------------------------
    // Convert shared into exclusive ownership and move the value out. Only the caller may still own the node.
    //------------------------------------------------------------------------------------------------------------------

    public reclaim(key: SlotKey): T {
        const entry = this.entry(key);
        if (1 !== entry.owners) {
            throw new OwnershipInvariantViolation(key, entry.owners);
        }
        const next = entry.next;
        const previous = entry.previous;
        entry.next = undefined;
        entry.previous = undefined;
        entry.owners = 0;
        this.free(key);
        if (next) {
            this.release(next);
        }
        if (previous) {
            this.release(previous);
        }
        return entry.value;
    }

    //------------------------------------------------------------------------------------------------------------------
    // Detach a link and hand its ownership over to the caller
    //------------------------------------------------------------------------------------------------------------------

    public takeNext(key: SlotKey) {
        const entry = this.entry(key);
        const next = entry.next;
        entry.next = undefined;
        return next;
    }

    public takePrevious(key: SlotKey) {
        const entry = this.entry(key);
        const previous = entry.previous;
        entry.previous = undefined;
        return previous;
    }

    //------------------------------------------------------------------------------------------------------------------
    // Store a link. The caller's ownership of the target moves into the link, and the link's former target (if any)
    // is released.
    //------------------------------------------------------------------------------------------------------------------

    public setNext(key: SlotKey, target: SlotKey | undefined) {
        const replaced = this.takeNext(key);
        this.entry(key).next = target;
        if (replaced) {
            this.release(replaced);
        }
    }

    public setPrevious(key: SlotKey, target: SlotKey | undefined) {
        const replaced = this.takePrevious(key);
        this.entry(key).previous = target;
        if (replaced) {
            this.release(replaced);
        }
    }

    //------------------------------------------------------------------------------------------------------------------
    // Read-only accessors
    //------------------------------------------------------------------------------------------------------------------

    public value(key: SlotKey) {
        return this.entry(key).value;
    }

    public next(key: SlotKey) {
        return this.entry(key).next;
    }

    public previous(key: SlotKey) {
        return this.entry(key).previous;
    }

    public owners(key: SlotKey) {
        return this.entry(key).owners;
    }

    public isLive(key: SlotKey) {
        const slot = this.slots[key.index];
        return undefined !== slot && slot.generation === key.generation && undefined !== slot.entry;
    }

    public get size() {
        return this.liveNodes;
    }

    //------------------------------------------------------------------------------------------------------------------
    // Compare two keys
    //------------------------------------------------------------------------------------------------------------------

    public static isSameKey(a: SlotKey | undefined, b: SlotKey | undefined) {
        return a === b || (undefined !== a && undefined !== b && a.index === b.index && a.generation === b.generation);
    }

    //------------------------------------------------------------------------------------------------------------------
    // Internal helpers
    //------------------------------------------------------------------------------------------------------------------

    private entry(key: SlotKey): Entry<T> {
        const slot = this.slots[key.index];
        if (undefined === slot || slot.generation !== key.generation || undefined === slot.entry) {
            throw new StaleNodeException(key);
        }
        return slot.entry;
    }

    private slotAt(index: number): Slot<T> {
        const slot = this.slots[index];
        if (undefined === slot) {
            throw new Error(`Internal error: Slot ${index} does not exist`);
        }
        return slot;
    }

    private free(key: SlotKey) {
        const slot = this.slotAt(key.index);
        slot.entry = undefined;
        slot.generation++;
        this.freeSlots.push(key.index);
        this.liveNodes--;
    }
}

import type { SlotKey } from "../features/node-arena.js";

//----------------------------------------------------------------------------------------------------------------------
// A node was about to be reclaimed while something other than the caller still owned it
//----------------------------------------------------------------------------------------------------------------------

export class OwnershipInvariantViolation extends Error {

    public constructor(public readonly key: SlotKey, public readonly owners: number) {
        super(
            `Internal error: Node ${key.index}/${key.generation} still has ${owners} owner(s) when it was reclaimed`
            + " (expected exactly 1). A link to it was not cleared before the reclaim."
        );
        this.name = "OwnershipInvariantViolation";
    }
}

//----------------------------------------------------------------------------------------------------------------------
// The head/tail/length bookkeeping or the links between the nodes are inconsistent
//----------------------------------------------------------------------------------------------------------------------

export class LogIntegrityViolation extends Error {

    public constructor(message: string) {
        super(`Internal error: ${message}`);
        this.name = "LogIntegrityViolation";
    }
}

//----------------------------------------------------------------------------------------------------------------------
// A key or node view was used after the node has been freed
//----------------------------------------------------------------------------------------------------------------------

export class StaleNodeException extends Error {

    public constructor(public readonly key: SlotKey) {
        super(`Node ${key.index}/${key.generation} has already been removed`);
        this.name = "StaleNodeException";
    }
}

import type { NodeArena, SlotKey } from "./node-arena.js";

//----------------------------------------------------------------------------------------------------------------------
// A cursor that walks the nodes of a log, forwards via next() or backwards via nextBack(). It holds no ownership and
// never modifies the nodes. The cursor is exhausted when it runs off either end of the chain or when the node it
// points to has been removed. To start over, create a new cursor.
//----------------------------------------------------------------------------------------------------------------------

export class LogCursor implements IterableIterator<string> {

    //------------------------------------------------------------------------------------------------------------------
    // Initialisation
    //------------------------------------------------------------------------------------------------------------------

    public constructor(private readonly arena: NodeArena<string>, private current: SlotKey | undefined) { }

    //------------------------------------------------------------------------------------------------------------------
    // Step forwards
    //------------------------------------------------------------------------------------------------------------------

    public next(): IteratorResult<string, undefined> {
        return this.step(key => this.arena.next(key));
    }

    //------------------------------------------------------------------------------------------------------------------
    // Step backwards
    //------------------------------------------------------------------------------------------------------------------

    public nextBack(): IteratorResult<string, undefined> {
        return this.step(key => this.arena.previous(key));
    }

    //------------------------------------------------------------------------------------------------------------------
    // Read the current value and move on
    //------------------------------------------------------------------------------------------------------------------

    private step(advance: (key: SlotKey) => SlotKey | undefined): IteratorResult<string, undefined> {
        const current = this.current;
        if (undefined === current || !this.arena.isLive(current)) {
            this.current = undefined;
            return { done: true, value: undefined };
        }
        const value = this.arena.value(current);
        this.current = advance(current);
        return { done: false, value };
    }

    //------------------------------------------------------------------------------------------------------------------
    // Iterate with nextBack() instead of next()
    //------------------------------------------------------------------------------------------------------------------

    public reversed(): IterableIterator<string> {
        const iterator: IterableIterator<string> = {
            next: () => this.nextBack(),
            [Symbol.iterator]: () => iterator
        };
        return iterator;
    }

    //------------------------------------------------------------------------------------------------------------------
    // Drain the remaining values (forwards)
    //------------------------------------------------------------------------------------------------------------------

    public toArray() {
        return Array.from(this);
    }

    public [Symbol.iterator]() {
        return this;
    }
}

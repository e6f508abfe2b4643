import { inspect } from "node:util";
import { LogIntegrityViolation } from "../data/exception.js";
import { Optional } from "../data/optional.js";
import { DEFAULT_TRANSACTION_LOG_OPTIONS, type TransactionLogOptions } from "../data/options.js";
import { LogCursor } from "./log-cursor.js";
import { LogNode } from "./log-node.js";
import { NodeArena, type SlotKey } from "./node-arena.js";

//----------------------------------------------------------------------------------------------------------------------
// Base class for transaction logs: a FIFO list of string entries. The head and tail slots each own the node they
// point to. Subclasses decide how the nodes are linked when appending and popping.
//----------------------------------------------------------------------------------------------------------------------

export abstract class LinkedLog implements Iterable<string> {

    protected readonly arena = new NodeArena<string>();
    protected readonly options: Readonly<TransactionLogOptions>;
    protected firstNode?: SlotKey = undefined;
    protected lastNode?: SlotKey = undefined;
    protected numberOfEntries = 0;

    //------------------------------------------------------------------------------------------------------------------
    // Initialisation
    //------------------------------------------------------------------------------------------------------------------

    public constructor(options: Partial<TransactionLogOptions> = {}) {
        this.options = { ...DEFAULT_TRANSACTION_LOG_OPTIONS, ...options };
    }

    //------------------------------------------------------------------------------------------------------------------
    // Operations that depend on the kind of linking
    //------------------------------------------------------------------------------------------------------------------

    protected abstract readonly name: string;
    protected abstract readonly isDoublyLinked: boolean;

    public abstract append(value: string): void;
    public abstract pop(): Optional<string>;

    //------------------------------------------------------------------------------------------------------------------
    // Size
    //------------------------------------------------------------------------------------------------------------------

    public get length() {
        return this.numberOfEntries;
    }

    public isEmpty() {
        return 0 === this.numberOfEntries;
    }

    //------------------------------------------------------------------------------------------------------------------
    // Obtain the first and the last node
    //------------------------------------------------------------------------------------------------------------------

    public head(): Optional<LogNode> {
        return Optional.of(this.firstNode).map(key => new LogNode(this.arena, key));
    }

    public tail(): Optional<LogNode> {
        return Optional.of(this.lastNode).map(key => new LogNode(this.arena, key));
    }

    //------------------------------------------------------------------------------------------------------------------
    // Cursors
    //------------------------------------------------------------------------------------------------------------------

    public cursor() {
        return new LogCursor(this.arena, this.firstNode);
    }

    public reverseCursor() {
        return new LogCursor(this.arena, this.lastNode);
    }

    public cursorAt(node: LogNode) {
        if (!node.belongsTo(this.arena)) {
            throw new Error("The node does not belong to this log");
        }
        return new LogCursor(this.arena, node.key);
    }

    //------------------------------------------------------------------------------------------------------------------
    // Iterate over the values
    //------------------------------------------------------------------------------------------------------------------

    public values(): IterableIterator<string> {
        return this.cursor();
    }

    public reverseValues(): IterableIterator<string> {
        return this.reverseCursor().reversed();
    }

    public [Symbol.iterator]() {
        return this.values();
    }

    public toArray() {
        return Array.from(this.values());
    }

    //------------------------------------------------------------------------------------------------------------------
    // Remove all entries, one pop at a time
    //------------------------------------------------------------------------------------------------------------------

    public clear() {
        let removed = 0;
        while (this.pop().isPresent()) {
            removed++;
        }
        this.options.logger.debug(`${this.name}: Cleared ${removed} entries`);
        return removed;
    }

    //------------------------------------------------------------------------------------------------------------------
    // Reclaim the value of a detached node (the caller must be its only owner)
    //------------------------------------------------------------------------------------------------------------------

    protected reclaim(key: SlotKey) {
        const owners = this.arena.owners(key);
        this.options.logger.debug(`${this.name}: Reclaiming node ${key.index}/${key.generation} (${owners} owner(s))`);
        if (1 !== owners) {
            this.options.logger.error(`${this.name}: Node ${key.index}/${key.generation} is still linked`);
        }
        return this.arena.reclaim(key);
    }

    //------------------------------------------------------------------------------------------------------------------
    // Hook for subclasses, to be called at the end of each modification
    //------------------------------------------------------------------------------------------------------------------

    protected afterModification() {
        if (this.options.verifyIntegrity) {
            this.verifyIntegrity();
        }
    }

    //------------------------------------------------------------------------------------------------------------------
    // Walk the chain in both directions and validate the links, the length and the owner counts
    //------------------------------------------------------------------------------------------------------------------

    public verifyIntegrity() {
        if (0 === this.numberOfEntries || undefined === this.firstNode || undefined === this.lastNode) {
            if (0 !== this.numberOfEntries || undefined !== this.firstNode || undefined !== this.lastNode) {
                this.fail(`The length is ${this.numberOfEntries} but head or tail is missing`);
            }
        } else {
            if (1 === this.numberOfEntries && !NodeArena.isSameKey(this.firstNode, this.lastNode)) {
                this.fail("The only node is not both head and tail");
            }
            this.verifyForwardChain(this.firstNode, this.lastNode);
            if (this.isDoublyLinked) {
                this.verifyBackwardChain(this.lastNode, this.firstNode);
            }
        }
        if (this.arena.size !== this.numberOfEntries) {
            this.fail(`The log has ${this.numberOfEntries} entries but ${this.arena.size} live nodes`);
        }
    }

    private verifyForwardChain(first: SlotKey, last: SlotKey) {
        let steps = 0;
        let previous: SlotKey | undefined = undefined;
        for (let key: SlotKey | undefined = first; key; key = this.arena.next(key)) {
            if (this.numberOfEntries < ++steps) {
                this.fail(`Following "next" from the head visits more than ${this.numberOfEntries} nodes`);
            }
            const backReference = this.arena.previous(key);
            if (this.isDoublyLinked ? !NodeArena.isSameKey(backReference, previous) : undefined !== backReference) {
                this.fail(`Node ${steps} does not link back to its predecessor`);
            }
            const expectedOwners = (previous ? 1 : 0) + (this.arena.next(key) && this.isDoublyLinked ? 1 : 0)
                + (NodeArena.isSameKey(key, first) ? 1 : 0) + (NodeArena.isSameKey(key, last) ? 1 : 0);
            if (expectedOwners !== this.arena.owners(key)) {
                this.fail(`Node ${steps} has ${this.arena.owners(key)} owners instead of ${expectedOwners}`);
            }
            previous = key;
        }
        if (steps !== this.numberOfEntries || !NodeArena.isSameKey(previous, last)) {
            this.fail(`Following "next" from the head does not end at the tail after ${this.numberOfEntries} nodes`);
        }
    }

    private verifyBackwardChain(last: SlotKey, first: SlotKey) {
        let steps = 0;
        let successor: SlotKey | undefined = undefined;
        for (let key: SlotKey | undefined = last; key; key = this.arena.previous(key)) {
            if (this.numberOfEntries < ++steps) {
                this.fail(`Following "previous" from the tail visits more than ${this.numberOfEntries} nodes`);
            }
            if (!NodeArena.isSameKey(this.arena.next(key), successor)) {
                this.fail(`Node ${this.numberOfEntries - steps + 1} does not link forward to its successor`);
            }
            successor = key;
        }
        if (steps !== this.numberOfEntries || !NodeArena.isSameKey(successor, first)) {
            this.fail(`Following "previous" from the tail does not end at the head after ${this.numberOfEntries} nodes`);
        }
    }

    private fail(message: string): never {
        this.options.logger.error(`${this.name}: ${message}`);
        throw new LogIntegrityViolation(`${this.name}: ${message}`);
    }

    //------------------------------------------------------------------------------------------------------------------
    // Shallow representation (only the head and the tail, each without its neighbours)
    //------------------------------------------------------------------------------------------------------------------

    public toString() {
        const head = this.head().map(node => node.toString()).getOrDefault("none");
        const tail = this.tail().map(node => node.toString()).getOrDefault("none");
        return `${this.name} { length: ${this.numberOfEntries}, head: ${head}, tail: ${tail} }`;
    }

    public [inspect.custom]() {
        return this.toString();
    }
}

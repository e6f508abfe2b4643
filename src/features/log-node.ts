import { inspect } from "node:util";
import { Optional } from "../data/optional.js";
import { NodeArena, type SlotKey } from "./node-arena.js";

//----------------------------------------------------------------------------------------------------------------------
// Read-only view of a single node. It does not own the node: once the node has been popped, reading the view throws a
// StaleNodeException.
//----------------------------------------------------------------------------------------------------------------------

export class LogNode {

    //------------------------------------------------------------------------------------------------------------------
    // Initialisation
    //------------------------------------------------------------------------------------------------------------------

    public constructor(private readonly arena: NodeArena<string>, public readonly key: SlotKey) { }

    //------------------------------------------------------------------------------------------------------------------
    // The node's own fields
    //------------------------------------------------------------------------------------------------------------------

    public get value() {
        return this.arena.value(this.key);
    }

    public get hasNext() {
        return undefined !== this.arena.next(this.key);
    }

    public get hasPrevious() {
        return undefined !== this.arena.previous(this.key);
    }

    public get owners() {
        return this.arena.owners(this.key);
    }

    public get isLive() {
        return this.arena.isLive(this.key);
    }

    //------------------------------------------------------------------------------------------------------------------
    // Neighbours
    //------------------------------------------------------------------------------------------------------------------

    public next(): Optional<LogNode> {
        return Optional.of(this.arena.next(this.key)).map(key => new LogNode(this.arena, key));
    }

    public previous(): Optional<LogNode> {
        return Optional.of(this.arena.previous(this.key)).map(key => new LogNode(this.arena, key));
    }

    //------------------------------------------------------------------------------------------------------------------
    // Identity (the very same node)
    //------------------------------------------------------------------------------------------------------------------

    public is(other: LogNode) {
        return this.arena === other.arena && NodeArena.isSameKey(this.key, other.key);
    }

    public belongsTo(arena: NodeArena<string>) {
        return this.arena === arena;
    }

    //------------------------------------------------------------------------------------------------------------------
    // Shallow structural equality: same value and the same links being present (neighbours are not compared)
    //------------------------------------------------------------------------------------------------------------------

    public equals(other: LogNode) {
        return this.value === other.value
            && this.hasNext === other.hasNext
            && this.hasPrevious === other.hasPrevious;
    }

    //------------------------------------------------------------------------------------------------------------------
    // Shallow representation (never descends into the neighbours)
    //------------------------------------------------------------------------------------------------------------------

    public toString() {
        if (!this.isLive) {
            return `Node { removed: ${this.key.index}/${this.key.generation} }`;
        }
        return `Node { value: ${JSON.stringify(this.value)}, previous: ${this.hasPrevious}, next: ${this.hasNext} }`;
    }

    public [inspect.custom]() {
        return this.toString();
    }
}

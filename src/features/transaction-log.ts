import { Optional } from "../data/optional.js";
import type { TransactionLogOptions } from "../data/options.js";
import { LinkedLog } from "./linked-log.js";

//----------------------------------------------------------------------------------------------------------------------
// A doubly-linked transaction log. Each node is owned by its predecessor (via "next") and by its successor (via
// "previous"), the first and the last node additionally by the log's head and tail.
//----------------------------------------------------------------------------------------------------------------------

export class TransactionLog extends LinkedLog {

    protected readonly name = "TransactionLog";
    protected readonly isDoublyLinked = true;

    //------------------------------------------------------------------------------------------------------------------
    // Factory method
    //------------------------------------------------------------------------------------------------------------------

    public static empty(options: Partial<TransactionLogOptions> = {}) {
        return new TransactionLog(options);
    }

    //------------------------------------------------------------------------------------------------------------------
    // Append a value to the end of the log
    //------------------------------------------------------------------------------------------------------------------

    public append(value: string) {
        const node = this.arena.allocate(value);
        const oldTail = this.lastNode;
        this.lastNode = undefined;
        if (undefined === oldTail) {
            this.firstNode = this.arena.retain(node);
        } else {
            this.arena.setNext(oldTail, this.arena.retain(node));
            this.arena.setPrevious(node, oldTail);
        }
        this.lastNode = node;
        this.numberOfEntries++;
        this.options.logger.debug(`${this.name}: Appended ${JSON.stringify(value)} (length ${this.length})`);
        this.afterModification();
    }

    //------------------------------------------------------------------------------------------------------------------
    // Remove the first entry and return its value
    //------------------------------------------------------------------------------------------------------------------

    public pop(): Optional<string> {
        const head = this.firstNode;
        if (undefined === head) {
            return Optional.empty();
        }
        this.firstNode = undefined;
        const next = this.arena.takeNext(head);
        if (next) {
            // The successor's back-reference is the last link to the old head
            this.arena.setPrevious(next, undefined);
            this.firstNode = next;
        } else {
            const tail = this.lastNode;
            this.lastNode = undefined;
            if (tail) {
                this.arena.release(tail);
            }
        }
        this.numberOfEntries--;
        const value = this.reclaim(head);
        this.options.logger.debug(`${this.name}: Popped ${JSON.stringify(value)} (length ${this.length})`);
        this.afterModification();
        return Optional.of(value);
    }
}

import { Optional } from "../data/optional.js";
import type { TransactionLogOptions } from "../data/options.js";
import { LinkedLog } from "./linked-log.js";

//----------------------------------------------------------------------------------------------------------------------
// A singly-linked transaction log (nodes only know their successor)
//----------------------------------------------------------------------------------------------------------------------

export class ForwardTransactionLog extends LinkedLog {

    protected readonly name = "ForwardTransactionLog";
    protected readonly isDoublyLinked = false;

    public static empty(options: Partial<TransactionLogOptions> = {}) {
        return new ForwardTransactionLog(options);
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
            this.arena.release(oldTail);
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
        this.firstNode = this.arena.takeNext(head);
        if (undefined === this.firstNode) {
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

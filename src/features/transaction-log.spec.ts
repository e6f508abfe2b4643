import { inspect } from "node:util";
import { describe, expect, it } from "vitest";
import { LogIntegrityViolation, OwnershipInvariantViolation, StaleNodeException } from "../data/exception.js";
import { Optional } from "../data/optional.js";
import { Logger, LogLevel } from "../utils/logger.js";
import { MemoryOutputStream } from "../utils/output-stream.js";
import { TransactionLog } from "./transaction-log.js";

function logOf(...values: string[]) {
    const log = TransactionLog.empty({ verifyIntegrity: true });
    values.forEach(value => log.append(value));
    return log;
}

// Pops without clearing the successor's back-reference
class LeakyTransactionLog extends TransactionLog {
    public override pop(): Optional<string> {
        const head = this.firstNode;
        if (undefined === head) {
            return Optional.empty();
        }
        this.firstNode = this.arena.takeNext(head);
        this.numberOfEntries--;
        return Optional.of(this.reclaim(head));
    }
}

class MiscountingTransactionLog extends TransactionLog {
    public miscount() {
        this.numberOfEntries++;
    }
}

describe("TransactionLog", () => {
    it("appends to the tail", () => {
        const log = TransactionLog.empty();
        expect(log.head().isEmpty()).toBe(true);
        expect(log.tail().isEmpty()).toBe(true);
        expect(log.length).toBe(0);

        log.append("Testing1");
        expect(log.length).toBe(1);
        const onlyNode = log.head().getOrThrow();
        expect(onlyNode.value).toBe("Testing1");
        expect(onlyNode.hasNext).toBe(false);
        expect(onlyNode.hasPrevious).toBe(false);
        expect(onlyNode.is(log.tail().getOrThrow())).toBe(true);

        log.append("Testing2");
        expect(log.length).toBe(2);
        expect(log.head().getOrThrow().hasNext).toBe(true);
        expect(log.tail().getOrThrow().value).toBe("Testing2");

        log.append("Testing3");
        expect(log.length).toBe(3);
        expect(log.head().getOrThrow().next().getOrThrow().next().isPresent()).toBe(true);
        expect(log.tail().getOrThrow().value).toBe("Testing3");
    });

    it("keeps head and tail in place while the length grows", () => {
        const log = TransactionLog.empty({ verifyIntegrity: true });
        const values = ["a", "b", "c", "d", "e"];
        values.forEach((value, index) => {
            log.append(value);
            expect(log.length).toBe(index + 1);
            expect(log.head().getOrThrow().value).toBe("a");
            expect(log.tail().getOrThrow().value).toBe(value);
        });
    });

    it("pops in FIFO order", () => {
        const log = logOf("Testing1", "Testing2", "Testing3");

        expect(log.pop().get()).toBe("Testing1");
        expect(log.length).toBe(2);
        const head = log.head().getOrThrow();
        expect(head.value).toBe("Testing2");
        expect(head.next().getOrThrow().value).toBe("Testing3");
        expect(head.next().getOrThrow().is(log.tail().getOrThrow())).toBe(true);

        expect(log.pop().get()).toBe("Testing2");
        expect(log.length).toBe(1);
        expect(log.pop().get()).toBe("Testing3");
        expect(log.length).toBe(0);
        expect(log.head().isEmpty()).toBe(true);
        expect(log.tail().isEmpty()).toBe(true);
    });

    it("returns an empty result when popping an empty log", () => {
        const log = TransactionLog.empty();
        expect(log.pop().isEmpty()).toBe(true);
        expect(log.length).toBe(0);
        expect(log.isEmpty()).toBe(true);
    });

    it("clears the back-reference of the new head", () => {
        const log = logOf("a", "b", "c");
        log.pop();
        const head = log.head().getOrThrow();
        expect(head.hasPrevious).toBe(false);
        expect(head.previous().isEmpty()).toBe(true);
        expect(head.owners).toBe(2);
    });

    it("links adjacent nodes in both directions", () => {
        const log = logOf("a", "b", "c", "d");
        let visited = 0;
        for (let node = log.head(); node.isPresent(); node = node.getOrThrow().next()) {
            const current = node.getOrThrow();
            const next = current.next().get();
            if (next) {
                expect(next.previous().getOrThrow().is(current)).toBe(true);
            }
            visited++;
        }
        expect(visited).toBe(4);
        expect(log.tail().getOrThrow().previous().getOrThrow().value).toBe("c");
    });

    it("iterates forwards and backwards", () => {
        const log = logOf("a", "b", "c");
        expect(log.toArray()).toEqual(["a", "b", "c"]);
        expect([...log]).toEqual(["a", "b", "c"]);
        expect(Array.from(log.reverseValues())).toEqual(["c", "b", "a"]);
        expect(log.toArray()).toEqual(["a", "b", "c"]);
        expect(log.length).toBe(3);
    });

    it("iterates from a saved tail with a reversed cursor", () => {
        const log = logOf("vibes", "only");
        const tracker = log.cursorAt(log.tail().getOrThrow());
        expect(log.cursor().toArray()).toEqual(["vibes", "only"]);
        expect(Array.from(tracker.reversed())).toEqual(["only", "vibes"]);
    });

    it("tears down a long log iteratively", () => {
        const log = TransactionLog.empty();
        for (let i = 0; i < 100000; i++) {
            log.append(`entry-${i}`);
        }
        expect(log.clear()).toBe(100000);
        expect(log.length).toBe(0);
        expect(log.head().isEmpty()).toBe(true);
        log.verifyIntegrity();
        log.append("again");
        expect(log.toArray()).toEqual(["again"]);
    });

    it("prints nodes and logs without their neighbours", () => {
        const log = logOf("a", "b");
        expect(log.head().getOrThrow().toString()).toBe('Node { value: "a", previous: false, next: true }');
        expect(inspect(log.tail().getOrThrow())).toBe('Node { value: "b", previous: true, next: false }');
        expect(`${log}`).toBe(
            'TransactionLog { length: 2, head: Node { value: "a", previous: false, next: true },'
            + ' tail: Node { value: "b", previous: true, next: false } }'
        );
        expect(inspect(TransactionLog.empty())).toBe("TransactionLog { length: 0, head: none, tail: none }");
    });

    it("compares nodes by their own fields", () => {
        const log = logOf("x", "y");
        const other = logOf("x");
        expect(log.head().getOrThrow().equals(other.head().getOrThrow())).toBe(false);
        other.append("z");
        expect(log.head().getOrThrow().equals(other.head().getOrThrow())).toBe(true);
        expect(log.head().getOrThrow().is(other.head().getOrThrow())).toBe(false);
    });

    it("invalidates views of popped nodes", () => {
        const log = logOf("a", "b");
        const popped = log.head().getOrThrow();
        log.pop();
        expect(popped.isLive).toBe(false);
        expect(() => popped.value).toThrow(StaleNodeException);
        expect(() => log.cursorAt(popped).next()).not.toThrow();
    });

    it("logs appends, reclaims and pops", () => {
        const stream = new MemoryOutputStream();
        const log = TransactionLog.empty({ logger: new Logger(LogLevel.DEBUG, stream) });
        log.append("a");
        log.pop();
        const timestamp = "\\d{4}-\\d{2}-\\d{2} \\d{2}:\\d{2}:\\d{2}\\.\\d{3}";
        expect(stream.lines).toHaveLength(3);
        expect(stream.lines[0]).toMatch(new RegExp(`^${timestamp} DEBUG   TransactionLog: Appended "a" \\(length 1\\)$`));
        expect(stream.lines[1]).toMatch(/TransactionLog: Reclaiming node 0\/0 \(1 owner\(s\)\)$/);
        expect(stream.lines[2]).toMatch(/TransactionLog: Popped "a" \(length 0\)$/);
    });

    it("fails loudly when a popped node is still referenced", () => {
        const stream = new MemoryOutputStream();
        const log = new LeakyTransactionLog({ logger: new Logger(LogLevel.ERROR, stream) });
        log.append("a");
        log.append("b");
        expect(() => log.pop()).toThrow(OwnershipInvariantViolation);
        expect(stream.lines).toHaveLength(1);
        expect(stream.lines[0]).toMatch(/ERROR   TransactionLog: Node 0\/0 is still linked$/);
    });

    it("detects a length that does not match the chain", () => {
        const log = new MiscountingTransactionLog();
        log.append("a");
        log.append("b");
        log.verifyIntegrity();
        log.miscount();
        expect(() => log.verifyIntegrity()).toThrow(LogIntegrityViolation);
        expect(() => log.verifyIntegrity()).toThrow(/does not end at the tail after 3 nodes/);
    });
});

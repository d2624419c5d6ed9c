import assert from "node:assert";
import { describe, it } from "node:test";
import { ReflectionAccessError } from "../../src/errors.ts";
import { describeManagedMembers, getClassName, Managed, ManagedResource } from "../../src/managed.ts";

class Counter {
    private value = 0;

    @Managed("current count")
    get count(): number {
        return this.value;
    }

    @Managed("reset counter", { returns: "void" })
    reset(): void {
        this.value = 0;
    }

    @Managed("add to counter")
    add(amount: number, times: number): number {
        this.value += amount * times;
        return this.value;
    }

    @Managed()
    snapshot(): number {
        return this.value;
    }

    unmanaged(): number {
        return this.value;
    }
}

class DerivedCounter extends Counter {
    @Managed("derived only")
    peak(): number {
        return 0;
    }

    // Undecorated override hides the inherited marker
    override snapshot(): number {
        return 1;
    }
}

@ManagedResource({ className: "com.example.Named" })
class Named {}

describe("Managed", () => {
    it("should describe getters as value-returning with no parameters", () => {
        const count = describeManagedMembers(Counter).find((m) => m.name === "count");

        assert.deepStrictEqual(count, { name: "count", description: "current count", returnsValue: true, parameterCount: 0 });
    });

    it("should describe void methods", () => {
        const reset = describeManagedMembers(Counter).find((m) => m.name === "reset");

        assert.deepStrictEqual(reset, { name: "reset", description: "reset counter", returnsValue: false, parameterCount: 0 });
    });

    it("should count declared parameters", () => {
        const add = describeManagedMembers(Counter).find((m) => m.name === "add");

        assert.deepStrictEqual(add, { name: "add", description: "add to counter", returnsValue: true, parameterCount: 2 });
    });

    it("should default the description to an empty string", () => {
        const snapshot = describeManagedMembers(Counter).find((m) => m.name === "snapshot");

        assert.strictEqual(snapshot?.description, "");
    });

    it("should list only managed members, in definition order", () => {
        assert.deepStrictEqual(
            describeManagedMembers(Counter).map((m) => m.name),
            ["count", "reset", "add", "snapshot"],
        );
    });

    it("should not change the behaviour of decorated members", () => {
        const counter = new Counter();

        assert.strictEqual(counter.add(2, 3), 6);
        assert.strictEqual(counter.count, 6);
        counter.reset();
        assert.strictEqual(counter.count, 0);
    });

    it("should include inherited members and let undecorated overrides hide them", () => {
        assert.deepStrictEqual(
            describeManagedMembers(DerivedCounter).map((m) => m.name),
            ["peak", "count", "reset", "add"],
        );
    });

    it("should return no members for a plain class", () => {
        assert.deepStrictEqual(describeManagedMembers(Named), []);
    });

    it("should reject static members", () => {
        assert.throws(() => {
            class Broken {
                @Managed("static")
                static total(): number {
                    return 0;
                }
            }
            return Broken;
        }, /static or private member 'total'/);
    });

    it("should reject private members", () => {
        assert.throws(() => {
            class Broken {
                @Managed("private")
                #secret(): number {
                    return 0;
                }
            }
            return Broken;
        }, TypeError);
    });

    it("should wrap prototype access failures in ReflectionAccessError", () => {
        class Guarded {}
        Object.setPrototypeOf(
            Guarded.prototype,
            new Proxy(
                {},
                {
                    ownKeys() {
                        throw new Error("access denied");
                    },
                },
            ),
        );

        assert.throws(
            () => describeManagedMembers(Guarded),
            (err: unknown) =>
                err instanceof ReflectionAccessError &&
                err.className === "Guarded" &&
                err.memberName === undefined &&
                err.message === "Cannot inspect Guarded: access denied",
        );
    });

    it("should name the member whose descriptor could not be read", () => {
        class Guarded {}
        Object.setPrototypeOf(
            Guarded.prototype,
            new Proxy(
                { gauge: 1 },
                {
                    getOwnPropertyDescriptor() {
                        throw new Error("access denied");
                    },
                },
            ),
        );

        assert.throws(
            () => describeManagedMembers(Guarded),
            (err: unknown) => err instanceof ReflectionAccessError && err.memberName === "gauge" && err.message === "Cannot inspect Guarded.gauge: access denied",
        );
    });
});

describe("getClassName", () => {
    it("should prefer the @ManagedResource name", () => {
        assert.strictEqual(getClassName(Named), "com.example.Named");
    });

    it("should fall back to the constructor name", () => {
        assert.strictEqual(getClassName(Counter), "Counter");
    });

    it("should not inherit the @ManagedResource name", () => {
        class Child extends Named {}

        assert.strictEqual(getClassName(Child), "Child");
    });
});

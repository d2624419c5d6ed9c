import assert from "node:assert";
import { describe, it } from "node:test";
import { MalformedObjectNameError } from "../../src/errors.ts";
import { ObjectName } from "../../src/ObjectName.ts";

describe("ObjectName", () => {
    describe("parse", () => {
        it("should split domain and key properties", () => {
            const name = ObjectName.parse("app:type=Cache,name=users");

            assert.strictEqual(name.domain, "app");
            assert.strictEqual(name.getKeyProperty("type"), "Cache");
            assert.strictEqual(name.getKeyProperty("name"), "users");
            assert.strictEqual(name.getKeyProperty("missing"), undefined);
        });

        it("should keep key properties in written order", () => {
            const name = ObjectName.parse("app:type=Cache,name=users");

            assert.deepStrictEqual([...name.keyProperties.keys()], ["type", "name"]);
        });

        it("should sort key properties in the canonical name", () => {
            assert.strictEqual(ObjectName.parse("app:type=Cache,name=users").canonicalName, "app:name=users,type=Cache");
        });

        it("should compare keys by code unit, uppercase first", () => {
            assert.strictEqual(ObjectName.parse("d:b=1,B=2,a=3").canonicalName, "d:B=2,a=3,b=1");
        });

        it("should allow an empty domain", () => {
            assert.strictEqual(ObjectName.parse(":type=Foo").canonicalName, ":type=Foo");
        });

        it("should keep quoted values with their quotes", () => {
            const name = ObjectName.parse('app:type=Pool,path="/a,b=c:d"');

            assert.strictEqual(name.getKeyProperty("path"), '"/a,b=c:d"');
            assert.strictEqual(name.canonicalName, 'app:path="/a,b=c:d",type=Pool');
        });

        it("should accept escaped quotes inside quoted values", () => {
            const name = ObjectName.parse('app:label="say \\"hi\\""');

            assert.strictEqual(name.getKeyProperty("label"), '"say \\"hi\\""');
        });

        const malformed: Array<[string, RegExp]> = [
            ["no-colon", /missing ':'/],
            ["app:", /no key properties/],
            ["app:type", /without '='/],
            ["app:=Foo", /empty key/],
            ["app:type=", /empty value/],
            ["app:type=Foo,", /trailing ','/],
            ["app:type=Foo,type=Bar", /duplicate key 'type'/],
            ["app:ty*pe=Foo", /key 'ty\*pe'/],
            ["app:type=Fo:o", /value 'Fo:o'/],
            ["ap*p:type=Foo", /domain/],
            ['app:type="Foo', /unterminated/],
            ['app:type="Foo"x', /unexpected 'x'/],
            ['app:type="F\\oo"', /invalid escape/],
        ];

        for (const [text, message] of malformed) {
            it(`should reject ${JSON.stringify(text)}`, () => {
                assert.throws(
                    () => ObjectName.parse(text),
                    (err: unknown) => err instanceof MalformedObjectNameError && err.objectName === text && message.test(err.message),
                );
            });
        }
    });

    describe("of", () => {
        it("should build a name from a property record", () => {
            const name = ObjectName.of("app", { type: "Cache", name: "users" });

            assert.strictEqual(name.canonicalName, "app:name=users,type=Cache");
        });

        it("should validate the built name", () => {
            assert.throws(() => ObjectName.of("app", {}), MalformedObjectNameError);
        });
    });

    describe("equals", () => {
        it("should treat property order as insignificant", () => {
            const a = ObjectName.parse("app:type=Cache,name=users");
            const b = ObjectName.parse("app:name=users,type=Cache");

            assert.ok(a.equals(b));
            assert.strictEqual(String(a), String(b));
        });

        it("should distinguish different values", () => {
            assert.ok(!ObjectName.parse("app:type=Cache").equals(ObjectName.parse("app:type=Pool")));
        });
    });
});

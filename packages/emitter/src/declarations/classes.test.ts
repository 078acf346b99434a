import { describe, it } from "mocha";
import { expect } from "chai";
import { emitWrappers } from "../emitter.js";
import { buildFixture, fileLines } from "../emitter.fixture.js";

const block = (lines: readonly string[], first: string, length: number) => {
  const start = lines.indexOf(first);
  expect(start, `missing line: ${first}`).to.be.greaterThan(-1);
  return lines.slice(start, start + length);
};

describe("Class emission", () => {
  const fixture = buildFixture(
    [
      "// Namespace: Game",
      "public class Door",
      "{",
      "\t// Fields",
      "\tpublic int state; // 0x10",
      "\tprivate float KQWERTYUIOP; // 0x14",
      "\tprivate int secret; // 0x18",
      "\tpublic const int Limit = 3;",
      "\tpublic T payload; // 0x20",
      "",
      "\t// Methods",
      "\t// RVA: 0x100 Offset: 0x100 VA: 0x180000100",
      "\tpublic int get_Count() { }",
      "\t// RVA: 0x110 Offset: 0x110 VA: 0x180000110",
      "\tpublic void set_Count(int value) { }",
      "\t// RVA: 0x120 Offset: 0x120 VA: 0x180000120",
      "\tpublic bool get_state() { }",
      "\t// RVA: 0x130 Offset: 0x130 VA: 0x180000130",
      "\tpublic static string get_Type() { }",
      "\t// RVA: 0x140 Offset: 0x140 VA: 0x180000140",
      "\tpublic void Open() { }",
      "\t// RVA: 0x150 Offset: 0x150 VA: 0x180000150",
      "\tpublic void Door() { }",
      "\t// RVA: 0x160 Offset: 0x160 VA: 0x180000160",
      "\tprivate void Close() { }",
      "\t// RVA: 0x170 Offset: 0x170 VA: 0x180000170",
      "\tpublic void Open(int speed) { }",
      "}",
    ],
    {},
    [{ obfuscatedName: "Door.KQWERTYUIOP", friendlyName: "openTime" }]
  );
  const result = emitWrappers(fixture.declarations, fixture.registry);
  const lines = fileLines(result, "GameSDK.Game.cs");

  it("should expose private fields that have a friendly name", () => {
    expect(
      block(
        lines,
        "        /// <summary>Deobfuscated field. IL2CPP name: 'KQWERTYUIOP'</summary>",
        5
      )
    ).to.deep.equal([
      "        /// <summary>Deobfuscated field. IL2CPP name: 'KQWERTYUIOP'</summary>",
      "        public float openTime",
      "        {",
      '            get => Il2CppRuntime.GetField<float>(this, "KQWERTYUIOP");',
      '            set => Il2CppRuntime.SetField<float>(this, "KQWERTYUIOP", value);',
    ]);
  });

  it("should merge accessor pairs into one property", () => {
    expect(block(lines, "        public int Count", 5)).to.deep.equal([
      "        public int Count",
      "        {",
      '            get => Il2CppRuntime.Call<int>(this, "get_Count", global::System.Type.EmptyTypes);',
      '            set => Il2CppRuntime.InvokeVoid(this, "set_Count", new global::System.Type[] { typeof(int) }, value);',
      "        }",
    ]);
    expect(lines).to.not.include("        public int get_Count()");
  });

  it("should leave accessors of dropped properties as methods", () => {
    expect(lines).to.include("        public bool get_state()");
    expect(block(lines, "        public static string get_Type()", 4)).to.deep.equal([
      "        public static string get_Type()",
      "        {",
      '            return Il2CppRuntime.CallStatic<string>("Game", "Door", "get_Type", global::System.Type.EmptyTypes);',
      "        }",
    ]);
  });

  it("should keep overloads with different parameter types", () => {
    expect(lines).to.include("        public void Open()");
    expect(lines).to.include("        public void Open(int speed)");
  });

  it("should record every member it leaves out", () => {
    const member = (memberName: string, reason: string) => ({
      namespace: "Game",
      typeName: "Door",
      memberName,
      reason,
    });
    expect(result.exclusions).to.deep.equal([
      member("secret", "inaccessibleField"),
      member("Limit", "constField"),
      member("payload", "genericParameter"),
      member("Type", "skippedPropertyName"),
      member("state", "memberNameConflict"),
      member("Door", "memberNameConflict"),
      member("Close", "notPublic"),
    ]);
  });

  describe("Global namespace", () => {
    const global = buildFixture([
      "public class Tools",
      "{",
      "\t// Methods",
      "\t// RVA: 0x200 Offset: 0x200 VA: 0x180000200",
      "\tpublic int get_ഇ() { }",
      "\t// RVA: 0x210 Offset: 0x210 VA: 0x180000210",
      "\tpublic static int Roll() { }",
      "}",
    ]);
    const globalLines = fileLines(
      emitWrappers(global.declarations, global.registry),
      "GameSDK.Global.cs"
    );

    it("should look static members up with an empty namespace", () => {
      expect(globalLines).to.include(
        '            return Il2CppRuntime.CallStatic<int>("", "Tools", "Roll", global::System.Type.EmptyTypes);'
      );
    });

    it("should forward obfuscated properties by address", () => {
      expect(
        block(
          globalLines,
          "        /// <summary>Obfuscated property. Original name: 'ഇ'</summary>",
          5
        )
      ).to.deep.equal([
        "        /// <summary>Obfuscated property. Original name: 'ഇ'</summary>",
        "        public int unicode_property_1",
        "        {",
        "            get => Il2CppRuntime.CallByRva<int>(this, 0x200, global::System.Type.EmptyTypes);",
        "        }",
      ]);
    });
  });
});

import { createGeneratorConfig } from "../config/generator-config.js";
import type { GeneratorConfigInput } from "../config/generator-config.js";
import { createNameMappings } from "../mappings.js";
import { parseDump } from "../parser/dump-parser.js";
import { buildRegistry, type TypeRegistry } from "../registry/registry.js";

const typeWithMethod = (name: string): string[] => [
  `public class ${name}`,
  "{",
  "\t// Methods",
  "\tpublic void Touch() { }",
  "}",
];

/**
 * Namespaces:
 * - UnityEngine (imported): Camera, Object, Light
 * - TMPro (imported): Light
 * - Game: Player, Camera, Hidden (no members), FKQPZLMWOER (mapped)
 * - Game.Camera: Rig
 * - Alpha / Beta: Object
 * - Photon.Realtime: Room
 */
export const RESOLVER_DUMP = [
  "// Namespace: UnityEngine",
  ...typeWithMethod("Camera"),
  ...typeWithMethod("Object"),
  ...typeWithMethod("Light"),
  "// Namespace: TMPro",
  ...typeWithMethod("Light"),
  "// Namespace: Game",
  ...typeWithMethod("Player"),
  ...typeWithMethod("Camera"),
  "public class Hidden",
  "{",
  "}",
  ...typeWithMethod("FKQPZLMWOER"),
  "// Namespace: Game.Camera",
  ...typeWithMethod("Rig"),
  "// Namespace: Alpha",
  ...typeWithMethod("Object"),
  "// Namespace: Beta",
  ...typeWithMethod("Object"),
  "// Namespace: Photon.Realtime",
  ...typeWithMethod("Room"),
].join("\n");

export const createResolverRegistry = (
  input: GeneratorConfigInput = {}
): TypeRegistry =>
  buildRegistry(
    parseDump(RESOLVER_DUMP),
    createGeneratorConfig(input),
    createNameMappings([
      { obfuscatedName: "FKQPZLMWOER", friendlyName: "Inventory" },
    ])
  );

/**
 * Golden test types
 */

/**
 * One entry of a config.yaml. `files` lists every file the dump must
 * produce; each has an expected copy under expected/.
 */
export type TestEntry = {
  readonly input: string;
  readonly title: string;
  readonly files: readonly string[];
  readonly skipNamespaces?: readonly string[];
  readonly skipTypes?: readonly string[];
  /** Original name -> friendly name */
  readonly mappings?: Readonly<Record<string, string>>;
};

export type Scenario = {
  readonly pathParts: readonly string[];
  readonly title: string;
  readonly inputPath: string;
  /** Output file name -> path of its expected text */
  readonly expectedFiles: ReadonlyMap<string, string>;
  readonly skipNamespaces: readonly string[];
  readonly skipTypes: readonly string[];
  readonly mappings: Readonly<Record<string, string>>;
};

export type DescribeNode = {
  readonly name: string;
  readonly children: Map<string, DescribeNode>;
  tests: Scenario[];
};

import * as fs from "fs";
import * as path from "path";
import { getNodeValue, parseTree, printParseErrorCode } from "jsonc-parser";
import type { Node as JsonNode, ParseError } from "jsonc-parser";
import {
  MalformedManifestError,
  logger as defaultLogger,
  toFileSystemError,
} from "@burrow/common";
import type { Logger } from "@burrow/common";

import { atomicWriteFile } from "./atomicWrite";

export const MANIFEST_FILE = "package.json";

export type DependencyMap = Record<string, string>;

/**
 * Project descriptor.
 */
export interface Manifest {
  name: string;
  version: string;
  /**
   * Declaration order is significant: it decides which version gets hoisted.
   */
  dependencies: DependencyMap;
  devDependencies: DependencyMap;
  scripts: Record<string, string>;
  /**
   * Glob patterns, relative to the directory of the manifest.
   */
  workspaces: string[];
  bin?: string | Record<string, string>;
  /**
   * The whole parsed document, used to write the manifest back without losing
   * fields burrow does not know about.
   */
  raw: Record<string, unknown>;
}

/**
 * A single requirement: `requestedBy` wants a version of `name` matching `range`.
 */
export interface DependencySpec {
  name: string;
  range: string;
  isDev: boolean;
  requestedBy: string;
}

const DEPENDENCY_FIELDS = ["dependencies", "devDependencies"] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function stripBom(content: string): string {
  return content.charCodeAt(0) === 0xfeff ? content.slice(1) : content;
}

function findDuplicateKeys(objectNode: JsonNode): string[] {
  const seen = new Set<string>();
  const duplicates: string[] = [];
  for (const property of objectNode.children || []) {
    const key = property.children?.[0]?.value;
    if (typeof key !== "string") {
      continue;
    }
    if (seen.has(key)) {
      duplicates.push(key);
    }
    seen.add(key);
  }
  return duplicates;
}

function propertyNode(root: JsonNode, key: string): JsonNode | undefined {
  return root.children?.find((p) => p.children?.[0]?.value === key)
    ?.children?.[1];
}

function readStringMap(
  document: Record<string, unknown>,
  field: string,
  source: string | undefined
): Record<string, string> {
  const value = document[field];
  if (value === undefined || value === null) {
    return {};
  }
  if (!isRecord(value)) {
    throw new MalformedManifestError(
      `"${field}" must be an object${source ? ` in ${source}` : ""}`,
      source
    );
  }
  const result: Record<string, string> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry !== "string") {
      throw new MalformedManifestError(
        `"${field}.${key}" must be a string${source ? ` in ${source}` : ""}`,
        source
      );
    }
    result[key] = entry;
  }
  return result;
}

function readWorkspaces(
  document: Record<string, unknown>,
  source: string | undefined
): string[] {
  let value = document["workspaces"];
  // yarn style: { "workspaces": { "packages": [...] } }
  if (isRecord(value)) {
    value = value["packages"];
  }
  if (value === undefined || value === null) {
    return [];
  }
  if (!Array.isArray(value) || !value.every((p) => typeof p === "string")) {
    throw new MalformedManifestError(
      `"workspaces" must be a list of glob patterns${source ? ` in ${source}` : ""}`,
      source
    );
  }
  return value;
}

function readBin(
  document: Record<string, unknown>,
  source: string | undefined
): string | Record<string, string> | undefined {
  const bin = document["bin"];
  if (bin === undefined || typeof bin === "string") {
    return bin;
  }
  return readStringMap(document, "bin", source);
}

/**
 * Parses the text of a manifest.
 *
 * @param source Path of the file, used in messages only.
 */
export function parseManifest(
  content: string,
  source?: string,
  logger: Logger = defaultLogger
): Manifest {
  const errors: ParseError[] = [];
  const tree = parseTree(stripBom(content), errors, {
    disallowComments: true,
    allowTrailingComma: false,
  });
  if (errors.length > 0 || tree === undefined) {
    const first = errors[0];
    throw new MalformedManifestError(
      `Invalid JSON${source ? ` in ${source}` : ""}${
        first ? `: ${printParseErrorCode(first.error)} at offset ${first.offset}` : ""
      }`,
      source
    );
  }

  const document: unknown = getNodeValue(tree);
  if (!isRecord(document)) {
    throw new MalformedManifestError(
      `A manifest must be a JSON object${source ? ` (${source})` : ""}`,
      source
    );
  }

  for (const field of DEPENDENCY_FIELDS) {
    const node = propertyNode(tree, field);
    if (node?.type !== "object") {
      continue;
    }
    for (const duplicate of findDuplicateKeys(node)) {
      logger.warn(
        `"${duplicate}" is declared more than once in ${field}${
          source ? ` of ${source}` : ""
        }, using the last declaration`
      );
    }
  }

  const name = document["name"];
  if (typeof name !== "string" || name.length === 0) {
    throw new MalformedManifestError(
      `Missing "name"${source ? ` in ${source}` : ""}`,
      source
    );
  }
  const version = document["version"];
  if (version !== undefined && typeof version !== "string") {
    throw new MalformedManifestError(
      `"version" must be a string${source ? ` in ${source}` : ""}`,
      source
    );
  }

  return {
    name,
    version: version ?? "0.0.0",
    dependencies: readStringMap(document, "dependencies", source),
    devDependencies: readStringMap(document, "devDependencies", source),
    scripts: readStringMap(document, "scripts", source),
    workspaces: readWorkspaces(document, source),
    bin: readBin(document, source),
    raw: document,
  };
}

export function serializeManifest(manifest: Manifest): string {
  const document: Record<string, unknown> = {
    ...manifest.raw,
    name: manifest.name,
    version: manifest.version,
  };
  for (const field of DEPENDENCY_FIELDS) {
    const value = manifest[field];
    if (Object.keys(value).length > 0 || field in manifest.raw) {
      document[field] = value;
    }
  }
  return `${JSON.stringify(document, null, 2)}\n`;
}

export async function readManifest(
  dir: string,
  logger: Logger = defaultLogger
): Promise<Manifest> {
  const file = path.join(dir, MANIFEST_FILE);
  let content: string;
  try {
    content = await fs.promises.readFile(file, { encoding: "utf8" });
  } catch (e) {
    throw toFileSystemError(e, file, "read");
  }
  return parseManifest(content, file, logger);
}

export async function writeManifest(dir: string, manifest: Manifest): Promise<void> {
  await atomicWriteFile(path.join(dir, MANIFEST_FILE), serializeManifest(manifest));
}

/**
 * Returns a copy of the manifest with `name` required at `range`, moved to the
 * other dependency map when it was declared there.
 */
export function addDependency(
  manifest: Manifest,
  name: string,
  range: string,
  isDev = false
): Manifest {
  if (isDev) {
    const dependencies = { ...manifest.dependencies };
    delete dependencies[name];
    return {
      ...manifest,
      dependencies,
      devDependencies: { ...manifest.devDependencies, [name]: range },
    };
  }
  const devDependencies = { ...manifest.devDependencies };
  delete devDependencies[name];
  return {
    ...manifest,
    dependencies: { ...manifest.dependencies, [name]: range },
    devDependencies,
  };
}

export function removeDependency(manifest: Manifest, name: string): Manifest {
  const dependencies = { ...manifest.dependencies };
  const devDependencies = { ...manifest.devDependencies };
  delete dependencies[name];
  delete devDependencies[name];
  return { ...manifest, dependencies, devDependencies };
}

export function manifestId(manifest: Pick<Manifest, "name" | "version">): string {
  return `${manifest.name}@${manifest.version}`;
}

/**
 * Requirements of a manifest in declaration order, production first. A name
 * present in both maps is only required as a production dependency.
 */
export function dependencySpecs(
  manifest: Manifest,
  options: { includeDev?: boolean } = {}
): DependencySpec[] {
  const requestedBy = manifestId(manifest);
  const specs: DependencySpec[] = Object.entries(manifest.dependencies).map(
    ([name, range]) => ({ name, range, isDev: false, requestedBy })
  );
  if (options.includeDev ?? true) {
    for (const [name, range] of Object.entries(manifest.devDependencies)) {
      if (name in manifest.dependencies) {
        continue;
      }
      specs.push({ name, range, isDev: true, requestedBy });
    }
  }
  return specs;
}

// src/document-loader.ts — Document Loader
// Reads an architecture description and parses it as JSON or YAML.

import { existsSync, readFileSync, statSync } from "node:fs";
import { extname } from "node:path";
import {
  FileNotFoundError,
  ParseError,
  UnsupportedFormatError,
} from "./types.js";
import type { ArchitectureDocument, DocumentFormat, YamlParser } from "./types.js";

export interface LoadOptions {
  /** Parser from detectYamlParser(), or null when YAML support is unavailable. */
  yaml: YamlParser | null;
}

export interface LoadedDocument {
  document: ArchitectureDocument;
  format: DocumentFormat;
}

/**
 * Probe for the optional `yaml` package. Returns its parse function,
 * or null when the package cannot be imported.
 */
export async function detectYamlParser(): Promise<YamlParser | null> {
  try {
    const { parse } = await import("yaml");
    // Expand << merge keys; a repeated key keeps its last value
    return (content: string) => parse(content, { merge: true, uniqueKeys: false });
  } catch {
    return null;
  }
}

/**
 * Format implied by the file extension, or undefined when the
 * extension says nothing and content sniffing is needed.
 */
export function formatFromExtension(filePath: string): DocumentFormat | undefined {
  const ext = extname(filePath).toLowerCase();
  if (ext === ".yaml" || ext === ".yml") return "yaml";
  if (ext === ".json") return "json";
  return undefined;
}

export function loadDocument(filePath: string, options: LoadOptions): LoadedDocument {
  if (!existsSync(filePath) || !statSync(filePath).isFile()) {
    throw new FileNotFoundError(filePath);
  }
  const content = readFileSync(filePath, "utf-8");
  return parseDocument(content, filePath, options);
}

/**
 * Parse already-read content. `filePath` picks the format and labels errors.
 */
export function parseDocument(
  content: string,
  filePath: string,
  options: LoadOptions,
): LoadedDocument {
  const format = formatFromExtension(filePath);

  if (format === "yaml") {
    if (!options.yaml) throw new UnsupportedFormatError(filePath);
    return { document: parseYaml(options.yaml, content, filePath), format: "yaml" };
  }

  if (format === "json") {
    return { document: parseJson(content, filePath), format: "json" };
  }

  // Unknown extension: JSON first, then YAML
  try {
    return { document: parseJson(content, filePath), format: "json" };
  } catch (jsonErr: unknown) {
    if (!options.yaml) {
      throw new ParseError(
        `Cannot parse ${filePath}. Use .json or .yaml format.`,
        filePath,
        jsonErr,
      );
    }
    try {
      return { document: parseYaml(options.yaml, content, filePath), format: "yaml" };
    } catch (yamlErr: unknown) {
      throw new ParseError(
        `Cannot parse ${filePath}. Use .json or .yaml format.`,
        filePath,
        yamlErr,
      );
    }
  }
}

function parseJson(content: string, filePath: string): ArchitectureDocument {
  try {
    return JSON.parse(content);
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new ParseError(`Cannot parse ${filePath} as JSON: ${msg}`, filePath, err);
  }
}

function parseYaml(
  yaml: YamlParser,
  content: string,
  filePath: string,
): ArchitectureDocument {
  try {
    // An empty YAML file has no value
    return yaml(content) ?? null;
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new ParseError(`Cannot parse ${filePath} as YAML: ${msg}`, filePath, err);
  }
}

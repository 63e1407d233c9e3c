import * as fs from 'fs';
import * as yaml from 'yaml';
import SemanticReleaseError from '@semantic-release/error';
import type { DeployPluginConfig } from './plugin-config.js';

export const DEFAULT_CONFIG_FILE = 'docker-verify.yml';

type Reader<T> = (value: unknown, key: string) => T;

/**
 * A numeric YAML scalar together with its source text. Options typed as
 * strings take the text, so `imageTag: 1.0` stays `"1.0"`; numeric
 * options take the value.
 */
class NumericScalar {
  constructor(
    readonly value: number,
    readonly text: string,
  ) {}
}

function invalid(key: string, expected: string): SemanticReleaseError {
  return new SemanticReleaseError(
    'Invalid configuration file.',
    'EINVALIDCONFIG',
    `"${key}" must be ${expected}.`,
  );
}

const str: Reader<string> = (value, key) => {
  if (typeof value !== 'string') throw invalid(key, 'a string');
  return value;
};

const scalar: Reader<string> = (value, key) => {
  if (value instanceof NumericScalar) return value.text;
  if (typeof value !== 'string') throw invalid(key, 'a string');
  return value;
};

const num: Reader<number> = (value, key) => {
  if (!(value instanceof NumericScalar)) throw invalid(key, 'a number');
  return value.value;
};

const bool: Reader<boolean> = (value, key) => {
  if (typeof value !== 'boolean') throw invalid(key, 'true or false');
  return value;
};

const list: Reader<string[]> = (value, key) => {
  if (!Array.isArray(value)) throw invalid(key, 'a list of strings');
  return value.map((v, i) => scalar(v, `${key}[${i}]`));
};

const map: Reader<Record<string, string>> = (value, key) => {
  if (
    typeof value !== 'object' ||
    value === null ||
    Array.isArray(value) ||
    value instanceof NumericScalar
  ) {
    throw invalid(key, 'a mapping of strings');
  }
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(value)) {
    out[k] = scalar(v, `${key}.${k}`);
  }
  return out;
};

const FIELDS: {
  [K in keyof Required<DeployPluginConfig>]: Reader<DeployPluginConfig[K]>;
} = {
  image: str,
  imageName: str,
  imageNamespace: str,
  imageTag: scalar,
  registry: str,
  context: str,
  dockerfile: str,
  buildArgs: map,
  registryUsername: str,
  registryToken: str,
  containerName: str,
  ports: list,
  secretEnv: list,
  startupDelay: num,
  logTail: num,
  healthCheck: bool,
  logout: bool,
  branch: str,
};

function isField(key: string): key is keyof DeployPluginConfig {
  return Object.prototype.hasOwnProperty.call(FIELDS, key);
}

function assign<K extends keyof DeployPluginConfig>(
  target: DeployPluginConfig,
  key: K,
  value: unknown,
): void {
  target[key] = FIELDS[key](value, key);
}

function keyOf(node: unknown): string {
  return yaml.isScalar(node) ? String(node.value) : String(node);
}

/**
 * Convert a YAML node to plain values, keeping numeric scalars as
 * `NumericScalar` with the text they were written as.
 */
function toPlain(
  node: unknown,
  doc: yaml.Document.Parsed,
  text: string,
): unknown {
  if (yaml.isScalar(node)) {
    if (typeof node.value === 'number') {
      const source = node.range
        ? text.slice(node.range[0], node.range[1])
        : String(node.value);
      return new NumericScalar(node.value, source);
    }
    return node.value;
  }
  if (yaml.isSeq(node)) {
    return node.items.map((item) => toPlain(item, doc, text));
  }
  if (yaml.isMap(node)) {
    const out: Record<string, unknown> = {};
    for (const pair of node.items) {
      out[keyOf(pair.key)] = toPlain(pair.value, doc, text);
    }
    return out;
  }
  if (yaml.isNode(node)) {
    return node.toJS(doc);
  }
  return node;
}

/**
 * Parse the YAML text of a configuration file. Keys match the plugin
 * options; unknown keys and values of the wrong type are rejected with
 * `EINVALIDCONFIG` naming the offending key. An empty document yields an
 * empty configuration.
 *
 * @param text YAML source.
 * @returns The validated plugin configuration.
 */
export function parseConfig(text: string): DeployPluginConfig {
  const doc = yaml.parseDocument(text);
  const [firstError] = doc.errors;
  if (firstError) {
    throw new SemanticReleaseError(
      'Invalid configuration file.',
      'EINVALIDCONFIG',
      firstError.message,
    );
  }

  const root = doc.contents;
  if (root === null) return {};
  if (!yaml.isMap(root)) {
    throw new SemanticReleaseError(
      'Invalid configuration file.',
      'EINVALIDCONFIG',
      'The top level must be a mapping.',
    );
  }

  const cfg: DeployPluginConfig = {};
  for (const pair of root.items) {
    const key = keyOf(pair.key);
    if (!isField(key)) {
      throw new SemanticReleaseError(
        'Invalid configuration file.',
        'EINVALIDCONFIG',
        `Unknown option "${key}".`,
      );
    }
    assign(cfg, key, toPlain(pair.value, doc, text));
  }
  return cfg;
}

/**
 * Read and parse a configuration file.
 *
 * @param filePath Path to the YAML file.
 * @throws SemanticReleaseError `EINVALIDCONFIG` when the file is missing
 * or malformed.
 */
export function loadConfigFile(filePath: string): DeployPluginConfig {
  if (!fs.existsSync(filePath)) {
    throw new SemanticReleaseError(
      'Configuration file not found.',
      'EINVALIDCONFIG',
      `No configuration file at ${filePath}.`,
    );
  }
  return parseConfig(fs.readFileSync(filePath, 'utf8'));
}

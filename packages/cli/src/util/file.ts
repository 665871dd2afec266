import fs from "node:fs";
import path from "node:path";
import yaml from "js-yaml";
import {isPlainObject} from "@slashwatch/utils";
import {YargsError} from "./errors.js";

const {load, FAILSAFE_SCHEMA, Type} = yaml;

export const yamlSchema = FAILSAFE_SCHEMA.extend({
  implicit: [
    new Type("tag:yaml.org,2002:str", {
      kind: "scalar",
      construct: function construct(data: string | null): string {
        return data !== null ? data : "";
      },
    }),
  ],
});

export enum FileFormat {
  json = "json",
  yaml = "yaml",
  yml = "yml",
}

const fileFormats = Object.values<string>(FileFormat);

function isFileFormat(format: string): format is FileFormat {
  return fileFormats.includes(format);
}

/**
 * Parse file contents. Yaml scalars are all read as strings
 */
export function parse(contents: string, fileFormat: FileFormat): unknown {
  switch (fileFormat) {
    case FileFormat.json:
      return JSON.parse(contents);
    case FileFormat.yaml:
    case FileFormat.yml:
      return load(contents, {schema: yamlSchema});
  }
}

/**
 * Read a json or yaml document from a file
 */
export function readFile(filepath: string, acceptedFormats: FileFormat[] = [...Object.values(FileFormat)]): unknown {
  const fileFormat = path.extname(filepath).slice(1);
  if (!isFileFormat(fileFormat) || !acceptedFormats.includes(fileFormat)) {
    throw new YargsError(`Unsupported file format: ${filepath}`);
  }
  const contents = fs.readFileSync(filepath, "utf-8");
  return parse(contents, fileFormat);
}

/**
 * @see readFile
 * The document must be a mapping, an empty file reads as an empty one
 */
export function readObjectFile(filepath: string): Record<string, unknown> {
  const contents = readFile(filepath);
  if (contents === undefined || contents === null) {
    return {};
  }
  if (!isPlainObject(contents)) {
    throw new YargsError(`Expected a mapping at the top of ${filepath}`);
  }
  return contents;
}

export function mkdir(dirPath: string): void {
  fs.mkdirSync(dirPath, {recursive: true});
}

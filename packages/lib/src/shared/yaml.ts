import YAML from "yaml";

export function parseYamlDocument(content: string): unknown {
  return YAML.parse(content);
}

export function stringifyYamlDocument(value: unknown): string {
  return YAML.stringify(value, { indent: 2 });
}

import { checkArgument, checkNotNull } from "./preconditions";

const LABEL_KEY = /^[\p{L}\p{N}_-]+$/u;

/**
 * Build an API list filter matching every given label.
 *
 * { env: "prod", team: "infra" } -> '(labels.env = "prod") AND (labels.team = "infra")'
 *
 * Values are quoted with `"` and `\` escaped. Keys go in unquoted, so they are
 * limited to letters, digits, `_` and `-`.
 */
export function buildLabelsFilterString(labels: Record<string, string>): string {
  checkNotNull(labels, "labels");
  return Object.entries(labels)
    .map(([key, value]) => {
      checkArgument(LABEL_KEY.test(key), `Invalid label key "${key}"`);
      return `(labels.${key} = "${escapeFilterValue(value)}")`;
    })
    .join(" AND ");
}

function escapeFilterValue(value: string): string {
  return value.replace(/[\\"]/g, "\\$&");
}

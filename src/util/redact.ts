const SECRET_KEYS = new Set(["api_key", "apikey"]);

export function redactSecrets(input: string): string {
  return input.replace(/([?&]apikey=)[^&\s"]+/gi, "$1<redacted>");
}

export function redactedJson(obj: unknown): string {
  const json = JSON.stringify(obj, (key, value: unknown) => {
    if (SECRET_KEYS.has(key) && value !== undefined) {
      return "<redacted>";
    }
    return value;
  });
  return redactSecrets(json ?? "");
}

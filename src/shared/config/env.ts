export type Env = {
  INFLUX_URL: string;
  INFLUX_USERNAME: string;
  INFLUX_PASSWORD: string;
};

export const validateHttpUrl = (name: string, value: string): string => {
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    throw new Error(`${name} must be a valid absolute http/https URL. Received: ${value}`);
  }

  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new Error(`${name} must use http or https scheme. Received: ${value}`);
  }

  return value;
};

export const loadEnv = (env: NodeJS.ProcessEnv = process.env): Env => {
  const INFLUX_URL = validateHttpUrl("INFLUX_URL", env.INFLUX_URL ?? "http://localhost:8086");
  const INFLUX_USERNAME = env.INFLUX_USERNAME ?? "";
  const INFLUX_PASSWORD = env.INFLUX_PASSWORD ?? "";

  return { INFLUX_URL, INFLUX_USERNAME, INFLUX_PASSWORD };
};

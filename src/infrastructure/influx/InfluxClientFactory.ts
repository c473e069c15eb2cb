import { validateHttpUrl } from "../../shared/config/env";
import { runtimeCaps } from "../../shared/config/runtime.config";
import { InfluxHttpClient, type InfluxClientOptions } from "./InfluxHttpClient";

export const createInfluxClient = async (options: InfluxClientOptions): Promise<InfluxHttpClient> => {
  validateHttpUrl("INFLUX_URL", options.url);
  const { min, max } = runtimeCaps.timeoutMs;
  if (!Number.isInteger(options.timeoutMs) || options.timeoutMs < min || options.timeoutMs > max) {
    throw new Error(`timeoutMs must be an integer in [${min}..${max}]. Received: ${String(options.timeoutMs)}`);
  }
  return new InfluxHttpClient(options);
};

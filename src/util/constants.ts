export const DEFAULT_SCAN_CONTENT_TYPE = "text/plain";

export const DEFAULT_PORTS: Record<string, string> = {
  http: "80",
  https: "443",
};

export const DEFAULT_SESSION_TOKENS = [
  "asp.net_sessionid",
  "aspsessionid",
  "cfid",
  "cftoken",
  "jsessionid",
  "phpsessid",
];

export enum ParameterHandling {
  UseAll = "use_all",
  IgnoreValue = "ignore_value",
  IgnoreCompletely = "ignore_completely",
}

export const MAX_PORT = 65535;

export enum ExitCodes {
  Success = 0,
  GenericError = 1,
  Fatal = 17,
}

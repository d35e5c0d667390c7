// ABOUTME: Emits optional server debug logs and always-on warnings.
// ABOUTME: Debug output is gated by the DEBUG_LOGS environment flag.
function isDebugEnabled() {
  return process.env.DEBUG_LOGS === "true";
}

export function debugLog(message: string, data?: unknown) {
  if (!isDebugEnabled()) {
    return;
  }

  const emitDebug = console.info.bind(console);

  if (data === undefined) {
    emitDebug("[debug]", message);
    return;
  }

  emitDebug("[debug]", message, data);
}

export function warnLog(message: string, data?: unknown) {
  if (data === undefined) {
    console.warn("[warn]", message);
    return;
  }

  console.warn("[warn]", message, data);
}

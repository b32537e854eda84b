const isCI = !!process.env.CI;
const isDebugging = !!process.env.DEBUG;
const isTTY = process.stdout.isTTY;

export const disableAnimatedLog = isCI || isDebugging || !isTTY;

export const disableFileLog =
  process.env.NODE_ENV === "test" || !!process.env.BUGSTER_INSTALLER_LOG_DISABLED;

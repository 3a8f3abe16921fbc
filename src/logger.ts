/**
 * Debug 模式控制 (通过环境变量 DEBUG=true 启用)
 */
let debugMode = process.env.DEBUG === 'true';

/** 由配置覆盖环境变量的设定 */
export function setDebugMode(enabled: boolean): void {
  debugMode = enabled;
}

/**
 * Debug log 函数 - 只在 DEBUG 模式下输出
 */
export function debug(...args: unknown[]): void {
  if (debugMode) {
    console.log('[DEBUG]', ...args);
  }
}

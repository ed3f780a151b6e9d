/**
 * Intent guard runtime: the shared proxy instance.
 */
import { SecurityProxy } from '../service/proxy.js';

let proxy: SecurityProxy | null = null;

/**
 * Get the process-wide proxy. Its tables are read-only, so one instance
 * serves every request handler.
 */
export function getSecurityProxy(): SecurityProxy {
  if (!proxy) {
    proxy = new SecurityProxy();
  }
  return proxy;
}

import { BrowserFlags } from "../../core/domain/services/browser-session.service.js";

const BASE_SWITCHES = [
  // Display
  "--start-maximized",
  "--window-size=1920,1080",
  "--kiosk-printing",
  // Stability in containers
  "--no-sandbox",
  "--disable-dev-shm-usage",
  "--disable-gpu",
  "--disable-software-rasterizer",
  // Quiet profile
  "--disable-extensions",
  "--disable-popup-blocking",
  "--no-default-browser-check",
  "--no-first-run",
  "--disable-notifications",
  "--disable-default-apps",
  "--disable-background-networking",
  "--disable-sync",
  "--disable-translate",
  // Anti-detection
  "--disable-blink-features=AutomationControlled",
] as const;

const RELAXED_SECURITY_SWITCHES = [
  "--disable-web-security",
  "--allow-running-insecure-content",
  "--ignore-certificate-errors",
  "--allow-insecure-localhost",
  "--disable-client-side-phishing-detection",
  "--disable-features=BlockInsecurePrivateNetworkRequests",
] as const;

/** "intranet.local:8080" -> "http://intranet.local:8080"; schemes are kept. */
export function toOrigin(domain: string): string {
  const trimmed = domain.trim();
  return /^https?:\/\//i.test(trimmed) ? trimmed : `http://${trimmed}`;
}

/**
 * Chromium command-line switches for an automation session. Headless and
 * incognito mode are launch options, not switches, so they are not listed.
 */
export function buildChromiumArgs(
  flags: Pick<BrowserFlags, "disableWebSecurity" | "domainSkipSecurity">,
): string[] {
  const args: string[] = [...BASE_SWITCHES];
  if (flags.disableWebSecurity) {
    args.push(...RELAXED_SECURITY_SWITCHES);
    for (const domain of flags.domainSkipSecurity) {
      if (!domain.trim()) continue;
      args.push(`--unsafely-treat-insecure-origin-as-secure=${toOrigin(domain)}`);
    }
  }
  return args;
}

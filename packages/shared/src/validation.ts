/**
 * Workspace readiness validation for bolab.
 * Surfaces what's configured, what's missing, and what happens as a result.
 * Purely informational — never blocks.
 */

export interface ValidationCheck {
  label: string;
  status: 'pass' | 'warn' | 'fail';
  detail: string;
}

/**
 * Validate workspace readiness given config and filesystem checks.
 * Accepts pre-resolved booleans so the caller handles fs/exec logic.
 */
export function validateWorkspace(checks: {
  hasConfig: boolean;
  hasCampaignsDir: boolean;
  campaignsDirWritable: boolean;
  engineCommand: string | null;
  engineCommandFound: boolean;
  timeoutMs: number;
  campaignCount: number;
}): ValidationCheck[] {
  const results: ValidationCheck[] = [];

  results.push(checks.hasConfig
    ? { label: 'Workspace config', status: 'pass', detail: 'Found .bolab/config.json' }
    : { label: 'Workspace config', status: 'warn', detail: 'Not found — defaults apply' }
  );

  if (!checks.hasCampaignsDir) {
    results.push({ label: 'Campaigns directory', status: 'fail', detail: 'Missing — run `bolab init`' });
  } else if (!checks.campaignsDirWritable) {
    results.push({ label: 'Campaigns directory', status: 'fail', detail: 'Not writable — batches cannot be persisted' });
  } else {
    results.push({ label: 'Campaigns directory', status: 'pass', detail: `${checks.campaignCount} campaign(s)` });
  }

  if (!checks.engineCommand) {
    results.push({ label: 'Optimization engine', status: 'warn', detail: 'No engine.command — every batch will come from fallback sampling' });
  } else if (!checks.engineCommandFound) {
    results.push({ label: 'Optimization engine', status: 'warn', detail: `Command not found: ${checks.engineCommand} — batches will fall back to random sampling` });
  } else {
    results.push({ label: 'Optimization engine', status: 'pass', detail: checks.engineCommand });
  }

  results.push(checks.timeoutMs > 0
    ? { label: 'Engine timeout', status: 'pass', detail: `${checks.timeoutMs} ms` }
    : { label: 'Engine timeout', status: 'fail', detail: 'engine.timeout_ms must be positive' }
  );

  return results;
}

// Local NO_COLOR gate — shared is independent of bolab, no cross-package import.
const _useColor = !process.env.NO_COLOR && (process.stderr?.isTTY !== false);

/**
 * Format validation results for terminal output.
 */
export function formatValidation(checks: ValidationCheck[]): string {
  const lines: string[] = [];
  for (const c of checks) {
    const icon = c.status === 'pass' ? (_useColor ? '\x1b[32m✓\x1b[0m' : '✓')
               : c.status === 'warn' ? (_useColor ? '\x1b[33m⚠\x1b[0m' : '⚠')
               : (_useColor ? '\x1b[31m✗\x1b[0m' : '✗');
    lines.push(`  ${icon} ${c.label}: ${c.detail}`);
  }
  return lines.join('\n');
}

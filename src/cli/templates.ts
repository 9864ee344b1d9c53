/**
 * Embedded file templates for `hookgate init`.
 */

// ---------------------------------------------------------------------------
// .hookgate/config.yaml
// ---------------------------------------------------------------------------

export const DEFAULT_PROJECT_CONFIG = `\
# hookgate project configuration.
#
# With inherit_defaults: true, everything below is layered on top of the
# bundled rule set: categories with the same name gain rules and
# exceptions, new category names are added. Set it to false to replace the
# bundled rules entirely.

version: "1.0"
inherit_defaults: true

# open: a broken hook event or config lets the operation through.
# closed: it blocks PreToolUse events instead (stop events always pass).
failure_policy: open

command_guard:
  categories: []
  # - name: destructive
  #   exceptions:
  #     - pattern: '^\\s*rm\\s+-rf\\s+\\./tmp/?\\s*$'
  #       reason: "Scratch directory cleanup"

path_guard:
  protected: []
  # - glob: "**/migrations/**"
  #   reason: "Applied migrations are immutable"
  exceptions: []
  sentinel_markers: []

loop:
  default_max_iterations: 20
  default_completion_token: DONE

audit:
  enabled: true
  dir: .hookgate/logs
`;

// ---------------------------------------------------------------------------
// .claude/settings.json
// ---------------------------------------------------------------------------

/** Host events hookgate is wired to, with the tool matcher where one applies. */
export const HOOK_WIRING: ReadonlyArray<{ event: string; matcher?: string }> = [
  { event: 'PreToolUse', matcher: 'Bash|Write|Edit|MultiEdit|NotebookEdit' },
  { event: 'PostToolUse' },
  { event: 'PostToolUseFailure' },
  { event: 'UserPromptSubmit' },
  { event: 'Notification' },
  { event: 'Stop' },
  { event: 'SubagentStop' },
];

export interface HookHandler {
  matcher?: string;
  hooks: Array<{ type: 'command'; command: string; timeout?: number }>;
}

/**
 * The `hooks` section of .claude/settings.json. `command` is how the host
 * should invoke hookgate.
 */
export function generateHooksSection(command: string): Record<string, HookHandler[]> {
  const hooks: Record<string, HookHandler[]> = {};
  for (const { event, matcher } of HOOK_WIRING) {
    const handler: HookHandler = {
      hooks: [{ type: 'command', command: `${command} hook`, timeout: 30 }],
    };
    if (matcher) handler.matcher = matcher;
    hooks[event] = [handler];
  }
  return hooks;
}

export function generateClaudeSettingsJson(command: string): string {
  return JSON.stringify({ hooks: generateHooksSection(command) }, null, 2) + '\n';
}

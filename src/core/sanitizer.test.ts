import { describe, it, expect } from 'vitest';

import { BLOCKED_COMMAND, sanitizeCommand } from './sanitizer.js';

describe('sanitizeCommand', () => {
  it('should block recursive deletion of the root', () => {
    expect(sanitizeCommand('rm -rf / --no-preserve-root')).toEqual({
      command: BLOCKED_COMMAND,
      blocked: true,
    });
  });

  it('should block filesystem creation', () => {
    expect(sanitizeCommand('mkfs.ext4 /dev/sdb1').blocked).toBe(true);
  });

  it('should block a destructive command hidden in a fence', () => {
    expect(sanitizeCommand('```bash\ndd if=/dev/zero of=/dev/sda\n```').blocked).toBe(true);
  });

  it('should strip a fenced block with a language tag', () => {
    expect(sanitizeCommand('```bash\nls -la /tmp\n```')).toEqual({
      command: 'ls -la /tmp',
      blocked: false,
    });
  });

  it('should strip a single-line fence', () => {
    expect(sanitizeCommand('```whoami```').command).toBe('whoami');
  });

  it('should keep only the first non-empty line', () => {
    expect(sanitizeCommand('\n\n  id  \nuname -a\n').command).toBe('id');
  });

  it('should strip a leading shell prompt', () => {
    expect(sanitizeCommand('$ cat /etc/passwd').command).toBe('cat /etc/passwd');
  });

  it('should strip quotes wrapping the whole command', () => {
    expect(sanitizeCommand('"uname -a"').command).toBe('uname -a');
  });

  it('should leave quotes inside the command alone', () => {
    expect(sanitizeCommand("echo 'hi'").command).toBe("echo 'hi'");
  });

  it('should pass through an ordinary command', () => {
    expect(sanitizeCommand('ps aux')).toEqual({ command: 'ps aux', blocked: false });
  });

  it('should return an empty command for empty input', () => {
    expect(sanitizeCommand('   ')).toEqual({ command: '', blocked: false });
  });
});

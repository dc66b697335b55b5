import { ShellDialectRegistry } from '../../src/core/shell/ShellDialectRegistry';
import { VersionPaths } from '../../src/types/Shell';

describe('Shell dialects', () => {
  const paths: VersionPaths = {
    installDir: '/opt/homebrew/opt/php@8.2',
    binDir: '/opt/homebrew/opt/php@8.2/bin',
    sbinDir: '/opt/homebrew/opt/php@8.2/sbin',
  };

  describe('ShellDialectRegistry', () => {
    it('should recognise the known dialects', () => {
      expect(ShellDialectRegistry.isSupported('zsh')).toBe(true);
      expect(ShellDialectRegistry.isSupported('ksh')).toBe(false);
      expect(ShellDialectRegistry.isSupported('toString')).toBe(false);
    });
  });

  describe('startup candidates', () => {
    it.each<[string, string[]]>([
      ['bash', ['/home/tester/.bashrc', '/home/tester/.bash_profile', '/home/tester/.profile']],
      ['zsh', ['/home/tester/.zshrc', '/home/tester/.zprofile']],
      ['fish', ['/home/tester/.config/fish/config.fish']],
      ['unknown', ['/home/tester/.profile']],
    ])('should list %s files in order', (dialect, expected) => {
      if (!ShellDialectRegistry.isSupported(dialect)) {
        throw new Error(`unsupported ${dialect}`);
      }
      expect(ShellDialectRegistry.get(dialect).startupCandidates('/home/tester')).toEqual(expected);
    });
  });

  describe('posix dialects', () => {
    const zsh = ShellDialectRegistry.get('zsh');

    it('should prepend the version paths in the PATH block', () => {
      const lines = zsh.renderPathBlock(paths).split('\n');

      expect(lines).toContain(
        `export PATH='/opt/homebrew/opt/php@8.2/bin':'/opt/homebrew/opt/php@8.2/sbin':"$(phpswitch_strip_php_paths "$PATH")"`
      );
      expect(lines[lines.length - 1]).toBe('hash -r 2>/dev/null || true');
    });

    it('should quote single quotes', () => {
      expect(zsh.quote("/Users/o'neil/.zshrc")).toBe(`'/Users/o'\\''neil/.zshrc'`);
    });

    it('should source with a dot in plain sh', () => {
      expect(ShellDialectRegistry.get('unknown').sourceCommand('/home/tester/.profile')).toBe(
        ". '/home/tester/.profile'"
      );
    });

    it('should only have hooks for shells with a directory-change mechanism', () => {
      expect(ShellDialectRegistry.get('unknown').renderAutoSwitchHook({ command: 'phpswitch' })).toBeNull();
      expect(ShellDialectRegistry.get('zsh').renderAutoSwitchHook({ command: 'phpswitch' })).toContain(
        'add-zsh-hook chpwd _phpswitch_auto_switch'
      );
      expect(ShellDialectRegistry.get('bash').renderAutoSwitchHook({ command: 'phpswitch' })).toContain(
        'eval "$(phpswitch auto --shell bash 2>/dev/null)"'
      );
    });

    it('should write a sh reload script', () => {
      const script = zsh.renderReloadScript('php@8.2', paths).split('\n');

      expect(script[0]).toBe('#!/bin/sh');
      expect(script[1]).toBe('# phpswitch reload script for php@8.2');
      expect(zsh.reloadScriptExtension).toBe('.sh');
    });
  });

  describe('fish', () => {
    const fish = ShellDialectRegistry.get('fish');

    it('should not support live updates', () => {
      expect(fish.supportsLiveUpdate).toBe(false);
    });

    it('should set PATH as a list', () => {
      expect(fish.exportCommand(paths)).toBe(
        "set -gx PATH '/opt/homebrew/opt/php@8.2/bin' '/opt/homebrew/opt/php@8.2/sbin' $PATH"
      );
    });

    it('should escape quotes and backslashes', () => {
      expect(fish.quote("a'b\\c")).toBe("'a\\'b\\\\c'");
    });

    it('should hook PWD changes', () => {
      expect(fish.renderAutoSwitchHook({ command: '/usr/local/bin/phpswitch' })).toBe(
        [
          'function _phpswitch_auto_switch --on-variable PWD',
          '    /usr/local/bin/phpswitch auto --shell fish 2>/dev/null | source',
          'end',
          '',
          '_phpswitch_auto_switch',
        ].join('\n')
      );
    });
  });
});

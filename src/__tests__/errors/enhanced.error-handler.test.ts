import { EnhancedErrorHandler } from '../../errors/enhanced.error-handler';
import {
  BranchConfigurationError,
  RepositoryAccessError,
  SecurityBlockedError,
} from '../../errors/sync.error';
import { NotInitializedError } from '../../core/config.manager';

describe('EnhancedErrorHandler', () => {
  describe('format', () => {
    it('should point a public repository at its visibility settings', () => {
      const formatted = EnhancedErrorHandler.format(
        new SecurityBlockedError('PUBLIC_REPOSITORY', 'octo/dotfiles'),
      );

      expect(formatted.title).toBe(
        "SECURITY BLOCK: repository 'octo/dotfiles' is public. Configuration push denied",
      );
      expect(formatted.suggestions).toContain(
        'Make the repository private: https://github.com/octo/dotfiles/settings → Danger Zone → Change repository visibility',
      );
    });

    it('should surface the branch remediation steps', () => {
      const formatted = EnhancedErrorHandler.format(
        new BranchConfigurationError('develop', '/home/octo/.anvil/dotfiles', 'clone', 'fatal: Remote branch develop not found'),
      );

      expect(formatted.details).toBe('fatal: Remote branch develop not found');
      expect(formatted.suggestions).toEqual([
        "Update github.branch in your settings to a branch that exists (currently 'develop')",
        'Or delete the local repository at /home/octo/.anvil/dotfiles; it will be re-cloned with the configured branch',
      ]);
    });

    it('should key repository suggestions by failure reason', () => {
      const formatted = EnhancedErrorHandler.format(
        new RepositoryAccessError('Failed to pull latest changes for main', 'pull', 'NETWORK'),
      );

      expect(formatted.suggestions).toEqual(['Check your network connection and run the command again']);
    });

    it('should fall back to code-based suggestions', () => {
      const formatted = EnhancedErrorHandler.format(new NotInitializedError('Settings file not found'));

      expect(formatted.suggestions).toEqual([
        "Run 'anvil init --repo <owner/name>' to create the settings file",
      ]);
    });

    it('should format unknown values', () => {
      expect(EnhancedErrorHandler.format('boom')).toEqual({ title: 'boom', suggestions: [] });
    });
  });

  describe('handleError', () => {
    it('should log the title, raw diagnostic and suggestions', () => {
      const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
      const logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);

      EnhancedErrorHandler.handleError(
        new RepositoryAccessError('Failed to push branch x', 'push', 'REJECTED', ' ! [rejected] x -> x\n'),
        EnhancedErrorHandler.createContext('push', ['nvim'], '/tmp'),
      );

      expect(errorSpy).toHaveBeenCalledWith('❌ Error:', 'Failed to push branch x');
      expect(logSpy).toHaveBeenCalledWith('! [rejected] x -> x');
      expect(logSpy).toHaveBeenCalledWith(
        '   • The remote rejected the push; check branch protection rules and try again',
      );

      errorSpy.mockRestore();
      logSpy.mockRestore();
    });
  });
});

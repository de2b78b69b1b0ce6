// src/cli/commands/install-browsers.ts
import { Command } from 'commander';
import { execSync } from 'child_process';

export function registerInstallBrowsersCommand(program: Command): void {
  program
    .command('install-browsers')
    .description('Install the Playwright Chromium build used for rendering')
    .action(() => {
      try {
        execSync('npx playwright install chromium', {
          stdio: 'inherit',
        });
        console.log('✓ Chromium installed');
      } catch {
        console.error('✗ Failed to install Chromium');
        console.error('Note: pages that need no rendering still work, and --no-render skips the browser entirely.');
        process.exit(1);
      }
    });
}

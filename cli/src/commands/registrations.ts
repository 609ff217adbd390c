import { Command } from 'commander';
import { withRuntime } from '../runtime.js';
import { error, field, formatDate, heading, statusColor, success } from '../format.js';

export function registerRegistrationCommands(program: Command): void {
  program
    .command('verify-email <token>')
    .description('Redeem a verification token and activate the registration')
    .action((token: string) =>
      withRuntime(async ({ pipeline }) => {
        const result = await pipeline.confirmEmailVerification(token);
        if (!result.success) {
          error(`${result.code}: ${result.error}`);
          process.exitCode = 1;
          return;
        }

        const { registration } = result;
        success(`Registration ${registration.id} verified`);
        heading(registration.fullName);
        field('Email', registration.email);
        field('Status', statusColor(registration.status));
        field('Activated', formatDate(registration.activatedAt));
        console.log();
      })
    );
}

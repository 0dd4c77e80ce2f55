import type { AdapterContext, AdapterResolution } from './types';
import { GreenhouseAdapter } from './greenhouse';
import { LeverAdapter } from './lever';
import { AshbyAdapter } from './ashby';
import { WorkableAdapter } from './workable';
import { SmartRecruitersAdapter } from './smartrecruiters';
import { AmazonAdapter } from './amazon';
import { WorkdayAdapter, parseWorkdaySite } from './workday';
import { SuccessFactorsAdapter } from './successfactors';
import { EmailAlertAdapter, ALERT_PROFILES } from './email-alerts';
import { ImapMailboxConnector, type MailboxConnector } from './mailbox';
import type { MailConfig } from '../config';

export type ConnectorFactory = (config: MailConfig) => MailboxConnector;

const imapConnector: ConnectorFactory = config => new ImapMailboxConnector(config);

/**
 * Builds the adapter for one registry entry. Configuration gaps (manual
 * sources, missing identifiers or mailbox secrets) come back as `skipped`.
 */
export function resolveAdapter(ctx: AdapterContext, connect: ConnectorFactory = imapConnector): AdapterResolution {
  const { company, config } = ctx;
  const family = company.sourceFamily;

  if (family === 'manual') return { skipped: 'manual source' };
  if (!company.sourceIdentifier && family !== 'amazon') {
    return { skipped: `no source identifier for ${family}` };
  }

  switch (family) {
    case 'greenhouse':
      return { adapter: new GreenhouseAdapter(ctx) };
    case 'lever':
      return { adapter: new LeverAdapter(ctx) };
    case 'ashby':
      return { adapter: new AshbyAdapter(ctx) };
    case 'workable':
      return { adapter: new WorkableAdapter(ctx) };
    case 'smartrecruiters':
      return { adapter: new SmartRecruitersAdapter(ctx) };
    case 'amazon':
      return { adapter: new AmazonAdapter(ctx) };
    case 'successfactors':
      return { adapter: new SuccessFactorsAdapter(ctx) };
    case 'workday': {
      const site = parseWorkdaySite(company.sourceIdentifier);
      if (!site) return { skipped: `unrecognized Workday URL: ${company.sourceIdentifier}` };
      return { adapter: new WorkdayAdapter(ctx, site) };
    }
    case 'email_alert': {
      const profile = ALERT_PROFILES[company.sourceIdentifier];
      if (!profile) return { skipped: `unknown alert profile: ${company.sourceIdentifier}` };
      if (!config.mail) return { skipped: 'mailbox credentials not configured' };
      return { adapter: new EmailAlertAdapter(ctx, profile, connect(config.mail)) };
    }
  }
}

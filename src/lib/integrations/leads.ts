import { JWT } from 'google-auth-library';
import { AppConfig, getConfig } from '../config';
import { ExternalServiceError } from '../errors';
import { logger } from '../logger';

const SHEETS_SCOPE = 'https://www.googleapis.com/auth/spreadsheets';

export interface Lead {
  email: string;
  url: string;
  capturedAt: Date;
}

export interface LeadSink {
  append(lead: Lead): Promise<void>;
}

export function leadRow(lead: Lead): string[] {
  return [lead.email, lead.url, lead.capturedAt.toISOString()];
}

export class GoogleSheetsLeadSink implements LeadSink {
  private client: JWT | null = null;

  constructor(private readonly config: AppConfig) {}

  private getClient(): JWT {
    const { GOOGLE_SERVICE_ACCOUNT_EMAIL, GOOGLE_PRIVATE_KEY } = this.config;
    if (!GOOGLE_SERVICE_ACCOUNT_EMAIL || !GOOGLE_PRIVATE_KEY) {
      throw new ExternalServiceError('sheets', 'Lead capture is not configured');
    }
    if (!this.client) {
      this.client = new JWT({
        email: GOOGLE_SERVICE_ACCOUNT_EMAIL,
        // Keys pasted into env files carry literal "\n" sequences.
        key: GOOGLE_PRIVATE_KEY.replace(/\\n/g, '\n'),
        scopes: [SHEETS_SCOPE],
      });
    }
    return this.client;
  }

  async append(lead: Lead): Promise<void> {
    const spreadsheetId = this.config.LEADS_SPREADSHEET_ID;
    if (!spreadsheetId) {
      throw new ExternalServiceError('sheets', 'Lead spreadsheet is not configured');
    }
    const range = encodeURIComponent(this.config.LEADS_SHEET_RANGE);
    try {
      await this.getClient().request({
        url: `https://sheets.googleapis.com/v4/spreadsheets/${spreadsheetId}/values/${range}:append`,
        method: 'POST',
        params: { valueInputOption: 'RAW', insertDataOption: 'INSERT_ROWS' },
        data: { values: [leadRow(lead)] },
      });
    } catch (error) {
      throw new ExternalServiceError('sheets', 'Could not record lead', error);
    }
  }
}

/** Lead capture never blocks the free score; failures are logged. */
export async function captureLead(sink: LeadSink, lead: Lead): Promise<boolean> {
  try {
    await sink.append(lead);
    return true;
  } catch (error) {
    logger.warn('leads', `Lead not recorded for ${lead.email}`, error);
    return false;
  }
}

export function getLeadSink(): LeadSink {
  return new GoogleSheetsLeadSink(getConfig());
}

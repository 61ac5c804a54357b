import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { drive_v3, google, sheets_v4 } from 'googleapis';
import { SheetWriterInterface } from './sheet-writer.interface';
import { SheetGrid } from './sheet-grid';
import { parseServiceAccount } from '../config/env.validation';
import { RemoteWriteError, errorMessage } from '../models/price-feed.errors';

const SCOPES = [
  'https://www.googleapis.com/auth/spreadsheets',
  'https://www.googleapis.com/auth/drive.readonly',
];

interface GoogleClients {
  sheets: sheets_v4.Sheets;
  drive: drive_v3.Drive;
}

interface SheetTarget {
  spreadsheetId: string;
  range: string;
}

@Injectable()
export class GoogleSheetWriterService extends SheetWriterInterface {
  private readonly logger = new Logger(GoogleSheetWriterService.name);
  private readonly sheetName: string;
  private readonly spreadsheetId: string | undefined;
  private clients: GoogleClients | null = null;
  private target: Promise<SheetTarget> | null = null;

  constructor(private readonly configService: ConfigService) {
    super();
    this.sheetName = this.configService.get<string>('SHEET_NAME', 'Crypto_Tracker');
    this.spreadsheetId = this.configService.get<string>('SPREADSHEET_ID');
  }

  protected async writeGrid(grid: SheetGrid): Promise<void> {
    const { sheets } = this.getClients();
    const { spreadsheetId, range } = await this.resolveTarget();

    try {
      await sheets.spreadsheets.values.update({
        spreadsheetId,
        range,
        valueInputOption: 'RAW',
        requestBody: { values: grid },
      });
    } catch (error) {
      throw new RemoteWriteError(
        `Failed to update spreadsheet "${this.label}": ${errorMessage(error)}`,
        this.label,
        error,
      );
    }
  }

  private get label(): string {
    return this.spreadsheetId ?? this.sheetName;
  }

  private getClients(): GoogleClients {
    if (!this.clients) {
      const keyFile = this.configService.get<string>('GOOGLE_CREDENTIALS_FILE');
      const inline = this.configService.get<string>('GOOGLE_CREDENTIALS');
      const auth = new google.auth.GoogleAuth({
        scopes: SCOPES,
        ...(keyFile ? { keyFile } : inline ? { credentials: parseServiceAccount(inline) } : {}),
      });
      this.clients = {
        sheets: google.sheets({ version: 'v4', auth }),
        drive: google.drive({ version: 'v3', auth }),
      };
    }
    return this.clients;
  }

  // Resolved once; a failed lookup is retried on the next write.
  private resolveTarget(): Promise<SheetTarget> {
    if (!this.target) {
      this.target = this.lookupTarget().catch((error: unknown) => {
        this.target = null;
        throw error;
      });
    }
    return this.target;
  }

  private async lookupTarget(): Promise<SheetTarget> {
    const { sheets } = this.getClients();
    const spreadsheetId = this.spreadsheetId ?? (await this.findSpreadsheetId());

    let title: string | null | undefined;
    try {
      const { data } = await sheets.spreadsheets.get({
        spreadsheetId,
        fields: 'sheets.properties.title',
      });
      title = data.sheets?.[0]?.properties?.title;
    } catch (error) {
      throw new RemoteWriteError(
        `Failed to open spreadsheet "${this.label}": ${errorMessage(error)}`,
        this.label,
        error,
      );
    }

    if (!title) {
      throw new RemoteWriteError(`Spreadsheet "${this.label}" has no worksheets`, this.label);
    }

    this.logger.log(`Writing to worksheet "${title}" of spreadsheet ${spreadsheetId}`);
    return { spreadsheetId, range: `'${title.replace(/'/g, "''")}'!A1` };
  }

  private async findSpreadsheetId(): Promise<string> {
    const name = this.sheetName.replace(/\\/g, '\\\\').replace(/'/g, "\\'");
    let id: string | null | undefined;

    try {
      const { data } = await this.getClients().drive.files.list({
        q: `name = '${name}' and mimeType = 'application/vnd.google-apps.spreadsheet' and trashed = false`,
        fields: 'files(id, name)',
        pageSize: 1,
        includeItemsFromAllDrives: true,
        supportsAllDrives: true,
      });
      id = data.files?.[0]?.id;
    } catch (error) {
      throw new RemoteWriteError(
        `Failed to look up spreadsheet "${this.sheetName}": ${errorMessage(error)}`,
        this.sheetName,
        error,
      );
    }

    if (!id) {
      throw new RemoteWriteError(
        `Spreadsheet "${this.sheetName}" not found or not shared with the service account`,
        this.sheetName,
      );
    }
    return id;
  }
}

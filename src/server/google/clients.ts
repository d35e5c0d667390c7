// ABOUTME: Creates authenticated Google Sheets clients for the server runtime.
// ABOUTME: Authenticates with service account credentials read from the environment.
import { google, type sheets_v4 } from "googleapis";

const SHEETS_SCOPE = "https://www.googleapis.com/auth/spreadsheets";

export interface GoogleServiceAccount {
  clientEmail: string;
  privateKey: string;
}

/** The slice of the Sheets API the planner store calls. */
export interface SheetsClient {
  spreadsheets: {
    get(
      params: sheets_v4.Params$Resource$Spreadsheets$Get,
    ): Promise<{ data: sheets_v4.Schema$Spreadsheet }>;
    batchUpdate(
      params: sheets_v4.Params$Resource$Spreadsheets$Batchupdate,
    ): Promise<unknown>;
    values: {
      get(
        params: sheets_v4.Params$Resource$Spreadsheets$Values$Get,
      ): Promise<{ data: sheets_v4.Schema$ValueRange }>;
      update(
        params: sheets_v4.Params$Resource$Spreadsheets$Values$Update,
      ): Promise<unknown>;
      append(
        params: sheets_v4.Params$Resource$Spreadsheets$Values$Append,
      ): Promise<unknown>;
      batchClear(
        params: sheets_v4.Params$Resource$Spreadsheets$Values$Batchclear,
      ): Promise<unknown>;
    };
  };
}

type GoogleModule = typeof google;
type Environment = Record<string, string | undefined>;

export function readServiceAccount(env: Environment = process.env): GoogleServiceAccount {
  const clientEmail = env.GOOGLE_SERVICE_ACCOUNT_EMAIL?.trim() ?? "";
  const privateKey = (env.GOOGLE_SERVICE_ACCOUNT_PRIVATE_KEY ?? "").replace(/\\n/g, "\n");

  if (!clientEmail || !privateKey.trim()) {
    throw new Error("Missing Google service account credentials");
  }

  return { clientEmail, privateKey };
}

export function createSheetsClient(
  account: GoogleServiceAccount,
  googleModule: GoogleModule = google,
): sheets_v4.Sheets {
  const auth = new googleModule.auth.JWT({
    email: account.clientEmail,
    key: account.privateKey,
    scopes: [SHEETS_SCOPE],
  });

  return googleModule.sheets({ version: "v4", auth });
}

import { Server } from 'http';
import { createApp } from './app';
import { loadConfig } from './config';
import { XLSX_MIME_TYPE } from './controllers/reportController';
import { RosterReportService } from './services/rosterReportService';
import { TEST_DUTY_CODES, rosterWorkbookBuffer } from './utils/testFactories';

describe('app', () => {
  let server: Server;
  let baseUrl: string;

  beforeAll(done => {
    const config = loadConfig({ NODE_ENV: 'test', UPLOAD_LIMIT: '64kb' });
    const service = new RosterReportService({
      dutyCodes: TEST_DUTY_CODES,
      groupSeparator: config.roster.groupSeparator,
      reservedMarkers: config.roster.reservedMarkers
    });
    server = createApp(config, service).listen(0, '127.0.0.1', () => {
      const address = server.address();
      if (address && typeof address === 'object') {
        baseUrl = `http://127.0.0.1:${address.port}`;
      }
      done();
    });
  });

  afterAll(done => {
    server.close(done);
  });

  it('reports health', async () => {
    const response = await fetch(`${baseUrl}/health`);

    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({ status: 'healthy', environment: 'test' });
  });

  it('turns an uploaded roster into JSON rows', async () => {
    const response = await fetch(`${baseUrl}/api/v1/reports?format=json`, {
      method: 'POST',
      headers: { 'Content-Type': XLSX_MIME_TYPE, 'X-File-Name': 'roster.xlsx' },
      body: rosterWorkbookBuffer([
        'Medic 10',
        { name: 'Ava Park', code: 'STWEP', from: '06:00', through: '18:00', hours: 12 },
        { name: 'Ben Ode', code: 'STWEP', from: '18:00', through: '06:00', hours: 12 }
      ])
    });

    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({
      fileName: expect.stringMatching(/^On_Duty_Roster_\d{4}-\d{2}-\d{2}_\d{2}-\d{2}\.xlsx$/),
      reportDate: '',
      rows: {
        medicRows: [['AM', 'Medic 10', 'Ava Park', '', '', 'PM', 'Medic 10', 'Ben Ode', '', '']]
      }
    });
  });

  it('rejects a request without a workbook body', async () => {
    const response = await fetch(`${baseUrl}/api/v1/reports`, { method: 'POST' });

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ error: { message: 'Request body must be an .xlsx workbook', status: 400 } });
  });

  it('rejects an oversized upload', async () => {
    const response = await fetch(`${baseUrl}/api/v1/reports`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/octet-stream' },
      body: Buffer.alloc(128 * 1024, 1)
    });

    expect(response.status).toBe(413);
  });

  it('answers unknown routes with 404', async () => {
    const response = await fetch(`${baseUrl}/api/v1/unknown`);

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({ error: { message: 'Not found - /api/v1/unknown', status: 404 } });
  });
});

import { drugLabel } from '../../__tests__/helpers/fixtures';
import { MockUpstream } from '../../__tests__/helpers/mockUpstream';
import { OpenFdaService } from '../openfda.service';

describe('openFdaService', () => {
  const upstream = new MockUpstream();
  let service: OpenFdaService;

  beforeAll(async () => {
    await upstream.start();
    service = new OpenFdaService({
      url: `${upstream.baseUrl}/drug/label.json`,
      apiKey: 'test-fda-key',
      limit: 5,
      timeoutMs: 5000,
    });
  });

  afterAll(() => upstream.stop());

  beforeEach(() => {
    upstream.reset();
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('searches indications for the condition and maps well-formed labels', async () => {
    upstream.reply('openFda', 200, {
      results: [drugLabel(), drugLabel({ indications_and_usage: undefined })],
    });

    await expect(service.findMedications('Fracture noted in left tibia.')).resolves.toEqual({
      success: true,
      data: [
        {
          name: 'Painaway',
          dosage: 'Take 1 tablet every 6 hours',
          purpose: 'For temporary relief of minor aches and pains',
        },
      ],
    });
    expect(upstream.requests.openFda[0].query).toEqual({
      search: 'indications_and_usage:"Fracture noted in left tibia."',
      limit: '5',
      api_key: 'test-fda-key',
    });
    expect(console.warn).toHaveBeenCalledWith(
      'Skipped 1 openFDA label(s) missing name, dosage or purpose'
    );
  });

  it('skips labels without a brand name or dosage', async () => {
    upstream.reply('openFda', 200, {
      results: [
        drugLabel({ openfda: {} }),
        drugLabel({ openfda: { brand_name: [] } }),
        drugLabel({ dosage_and_administration: [] }),
        'not-a-label',
      ],
    });

    await expect(service.findMedications('rash')).resolves.toEqual({ success: true, data: [] });
  });

  it('caps long label text at 100 characters', async () => {
    const longDosage = 'x'.repeat(140);
    upstream.reply('openFda', 200, {
      results: [drugLabel({ dosage_and_administration: [longDosage] })],
    });

    const result = await service.findMedications('rash');
    expect(result.data[0].dosage).toBe('x'.repeat(100));
  });

  it('reports no matches as a successful empty result', async () => {
    upstream.reply('openFda', 404, { error: { code: 'NOT_FOUND', message: 'No matches found!' } });

    await expect(service.findMedications('rash')).resolves.toEqual({ success: true, data: [] });
  });

  it('degrades to an empty list on a server error', async () => {
    upstream.reply('openFda', 500, { error: 'boom' });

    await expect(service.findMedications('rash')).resolves.toEqual({
      success: false,
      data: [],
      error: 'openFDA returned status 500',
    });
  });

  it('degrades to an empty list when the body is not a search result', async () => {
    upstream.reply('openFda', 200, 'maintenance page');

    await expect(service.findMedications('rash')).resolves.toEqual({
      success: false,
      data: [],
      error: 'openFDA response has no results array',
    });
  });

  it('degrades to an empty list when the service is unreachable', async () => {
    const unreachable = new OpenFdaService({
      url: 'http://127.0.0.1:1/drug/label.json',
      limit: 5,
      timeoutMs: 2000,
    });

    const result = await unreachable.findMedications('rash');
    expect(result.success).toBe(false);
    expect(result.data).toEqual([]);
  });

  it('strips quotes from the condition and omits a missing API key', async () => {
    const keyless = new OpenFdaService({
      url: `${upstream.baseUrl}/drug/label.json`,
      limit: 3,
      timeoutMs: 5000,
    });
    upstream.reply('openFda', 200, { results: [] });

    await keyless.findMedications('"itchy" rash');

    expect(upstream.requests.openFda[0].query).toEqual({
      search: 'indications_and_usage:"itchy rash"',
      limit: '3',
    });
  });

  it('does not call out for a blank condition', async () => {
    await expect(service.findMedications(' "" ')).resolves.toEqual({ success: true, data: [] });
    expect(upstream.requests.openFda).toHaveLength(0);
  });
});

import { describe, it, expect } from 'vitest';
import { LanguageToolClient } from '../../../src/services/languagetool/LanguageToolClient.js';
import { ExternalServiceError } from '../../../src/types/errors.js';
import { stubHttpClient } from '../../helpers/http.js';

const CONFIG = { apiUrl: 'http://languagetool.test', language: 'en-GB', timeout: 1000 };

describe('LanguageToolClient', () => {
  it('posts form-encoded text and returns the parsed matches', async () => {
    const { client, requests } = stubHttpClient(() => ({
      status: 200,
      data: {
        software: { name: 'LanguageTool' },
        matches: [
          {
            message: 'Possible spelling mistake found.',
            offset: 0,
            length: 3,
            replacements: [{ value: 'The' }, { value: 'Tea' }],
            rule: { id: 'MORFOLOGIK_RULE_EN_US', category: { id: 'TYPOS' } },
          },
        ],
      },
    }));
    const languageTool = new LanguageToolClient(CONFIG, client);

    const matches = await languageTool.check('Teh cat');

    expect(requests).toHaveLength(1);
    expect(requests[0]?.method).toBe('post');
    expect(requests[0]?.url).toBe('/v2/check');
    expect(requests[0]?.data).toBe('text=Teh+cat&language=en-GB');
    expect(matches).toEqual([
      {
        message: 'Possible spelling mistake found.',
        offset: 0,
        length: 3,
        replacements: [{ value: 'The' }, { value: 'Tea' }],
        rule: { id: 'MORFOLOGIK_RULE_EN_US' },
      },
    ]);
  });

  it('rejects a response body of the wrong shape', async () => {
    const { client } = stubHttpClient(() => ({ status: 200, data: { matches: [{ offset: 'zero' }] } }));
    const languageTool = new LanguageToolClient(CONFIG, client);

    await expect(languageTool.check('text')).rejects.toBeInstanceOf(ExternalServiceError);
  });

  it('propagates HTTP errors for the caller to retry', async () => {
    const { client } = stubHttpClient(() => ({ status: 503, data: 'busy' }));
    const languageTool = new LanguageToolClient(CONFIG, client);

    await expect(languageTool.check('text')).rejects.toThrow('Request failed with status code 503');
  });

  it('reports availability from the languages endpoint', async () => {
    const up = stubHttpClient(() => ({ status: 200, data: [{ name: 'English', code: 'en' }] }));
    const down = stubHttpClient(() => {
      throw new Error('connect ECONNREFUSED');
    });

    await expect(new LanguageToolClient(CONFIG, up.client).isAvailable()).resolves.toBe(true);
    expect(up.requests[0]?.url).toBe('/v2/languages');
    await expect(new LanguageToolClient(CONFIG, down.client).isAvailable()).resolves.toBe(false);
  });
});

import { GazetteerParseError } from '../../common/errors';
import { adminCodesText, countryInfoText } from '../../testing/gazetteer.fixtures';
import { assertRegionText, parseAdminCodes, parseCountryInfo } from './region-names-parser';

describe('region names parser', () => {
  describe('parseCountryInfo', () => {
    it('should read iso code, name and continent and skip comments', () => {
      const { entries, skipped } = parseCountryInfo(
        countryInfoText([
          { isoCode: 'GB', name: 'United Kingdom', continent: 'EU' },
          { isoCode: 'NZ', name: 'New Zealand', continent: 'OC' },
        ]),
      );

      expect(skipped).toBe(0);
      expect([...entries.keys()]).toEqual(['GB', 'NZ']);
      expect(entries.get('NZ')).toEqual({ isoCode: 'NZ', name: 'New Zealand', continent: 'OC' });
    });

    it('should skip lines with empty fields or an unknown continent', () => {
      const { entries, skipped } = parseCountryInfo(
        countryInfoText([
          { isoCode: 'GB', name: '', continent: 'EU' },
          { isoCode: 'XX', name: 'Nowhere', continent: 'ZZ' },
          { isoCode: 'IE', name: 'Ireland', continent: 'EU' },
        ]),
      );

      expect(skipped).toBe(2);
      expect([...entries.keys()]).toEqual(['IE']);
    });
  });

  describe('parseAdminCodes', () => {
    const text = adminCodesText([
      ['GB.ENG', 'England'],
      ['GB.SCT', 'Scotland'],
      ['FR.11', 'Ile-de-France'],
      ['GB.WLS', ''],
    ]);

    it('should keep only the requested countries', () => {
      const { entries, skipped } = parseAdminCodes(text, new Set(['GB']));

      expect(entries).toEqual(
        new Map([
          ['GB.ENG', 'England'],
          ['GB.SCT', 'Scotland'],
        ]),
      );
      expect(skipped).toBe(1);
    });

    it('should read second level keys the same way', () => {
      const { entries } = parseAdminCodes(
        adminCodesText([['GB.ENG.J9', 'Nottinghamshire']]),
        new Set(['GB']),
      );

      expect(entries.get('GB.ENG.J9')).toBe('Nottinghamshire');
    });
  });

  describe('assertRegionText', () => {
    it('should accept a tab separated file', () => {
      expect(() =>
        assertRegionText(Buffer.from(adminCodesText([['GB.ENG', 'England']])), 'admin1CodesASCII.txt'),
      ).not.toThrow();
    });

    it('should reject an error page', () => {
      expect(() =>
        assertRegionText(Buffer.from('<html>503 Service Unavailable</html>'), 'admin2Codes.txt'),
      ).toThrow(new GazetteerParseError('admin2Codes.txt: not a tab separated geonames file'));
    });
  });
});

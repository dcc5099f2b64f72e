import { AddonEligibilityService } from '@app/addon-uploads/addon-eligibility.service';
import type { AddonUploadsConfig } from '@app/addon-uploads/addon-uploads.tokens';
import { buildTestConfig } from '@test/utils/addon-fakes';

const eligibility = (overrides: Partial<AddonUploadsConfig>) =>
  new AddonEligibilityService(buildTestConfig('/srv/media', overrides));

describe('AddonEligibilityService', () => {
  it('offers nothing while disabled', () => {
    const service = eligibility({ enabled: false });

    expect(service.enabled).toBe(false);
    expect(service.isOfferedFor({ productId: 'tee-42', categoryIds: [] })).toBe(false);
  });

  it('offers every product when no allow-lists are set', () => {
    expect(
      eligibility({}).isOfferedFor({ productId: 'tee-42', categoryIds: [] }),
    ).toBe(true);
  });

  it('restricts to listed products', () => {
    const service = eligibility({ productIds: ['tee-42'] });

    expect(service.isOfferedFor({ productId: 'tee-42', categoryIds: [] })).toBe(true);
    expect(service.isOfferedFor({ productId: 'mug-7', categoryIds: [] })).toBe(false);
  });

  it('restricts to listed categories unless "all" is present', () => {
    const service = eligibility({ categoryIds: ['12', '15'] });

    expect(service.isOfferedFor({ productId: 'tee-42', categoryIds: ['9', '15'] })).toBe(
      true,
    );
    expect(service.isOfferedFor({ productId: 'tee-42', categoryIds: ['9'] })).toBe(false);
    expect(
      eligibility({ categoryIds: ['all'] }).categoryAllowed(['9']),
    ).toBe(true);
  });
});

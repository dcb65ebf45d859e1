export type DbRole = 'fm_web' | 'fm_mobile' | 'fm_worker';
export type Audience = 'web' | 'mobile' | 'worker' | 'service';

export const roleForAudience = (aud: Audience): DbRole => {
  if (aud === 'mobile') return 'fm_mobile';
  if (aud === 'worker' || aud === 'service') return 'fm_worker';
  return 'fm_web';
};

import { SetMetadata } from '@nestjs/common';
import type { Audience } from '@fmops/auth';
import type { Capability } from './rbac.js';

export const IS_PUBLIC_KEY = 'isPublic';
export const REQUIRED_AUDIENCE_KEY = 'requiredAudience';
export const REQUIRED_CAPABILITIES_KEY = 'requiredCapabilities';

export const Public = () => SetMetadata(IS_PUBLIC_KEY, true);
export const RequireAudience = (aud: Audience) => SetMetadata(REQUIRED_AUDIENCE_KEY, aud);
export const RequireCapabilities = (...capabilities: Capability[]) =>
  SetMetadata(REQUIRED_CAPABILITIES_KEY, capabilities);

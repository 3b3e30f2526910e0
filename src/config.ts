// Demo configuration read from the environment.
//
//   SHININESS — specular exponent, overrides DEFAULT_LIGHTING.shininess

import { createLightingConfig } from "./engine";
import type { LightingConfig } from "./engine";

export function loadLighting(env: Record<string, string | undefined>): LightingConfig {
  const shininessParam = env.SHININESS;
  return createLightingConfig(shininessParam !== undefined ? { shininess: Number(shininessParam) } : {});
}

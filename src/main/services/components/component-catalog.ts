import type { ComponentId } from '@shared/contracts';

export interface ComponentDefinition {
  id: ComponentId;
  displayName: string;
  owner: string;
  repo: string;
  assetPattern: RegExp;
  assetPatternLabel: string;
}

export const LUMA_COMPONENT: ComponentDefinition = {
  id: 'luma',
  displayName: 'Luma3DS',
  owner: 'LumaTeam',
  repo: 'Luma3DS',
  assetPattern: /^Luma3DSv\d+\.\d+\.\d+\.zip/,
  assetPatternLabel: 'Luma3DSvX.Y.Z.zip'
};

export const GODMODE9_COMPONENT: ComponentDefinition = {
  id: 'godmode9',
  displayName: 'GodMode9',
  owner: 'd0k3',
  repo: 'GodMode9',
  assetPattern: /^GodMode9-v\d+\.\d+\.\d+.*\.zip/,
  assetPatternLabel: 'GodMode9-vX.Y.Z-*.zip'
};

export const COMPONENTS: Record<ComponentId, ComponentDefinition> = {
  luma: LUMA_COMPONENT,
  godmode9: GODMODE9_COMPONENT
};

import type { ProgressEvent, UpdateId, UpdateRecord } from '@shared/contracts';

export type ProgressListener = (event: ProgressEvent) => void;

export interface PackageInstaller {
  installPackages(ids: readonly UpdateId[], onProgress?: ProgressListener): Promise<void>;
}

export interface PackageBackend extends PackageInstaller {
  readonly kind: string;
  refreshCache(forceFullRefresh: boolean, onProgress?: ProgressListener): Promise<void>;
  getUpdates(onProgress?: ProgressListener): Promise<UpdateRecord[]>;
}

export class NoopPackageBackend implements PackageBackend {
  readonly kind = 'none';

  async refreshCache(_forceFullRefresh: boolean, _onProgress?: ProgressListener): Promise<void> {
    return;
  }

  async getUpdates(_onProgress?: ProgressListener): Promise<UpdateRecord[]> {
    return [];
  }

  async installPackages(_ids: readonly UpdateId[], _onProgress?: ProgressListener): Promise<void> {
    throw new Error('Nenhum backend de pacotes configurado neste ambiente.');
  }
}

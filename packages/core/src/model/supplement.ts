/**
 * Mount-time facts handed to the supplementer
 */

export const Labels = {
  /** "true" when the image registry must be reached through its VPC host */
  VPC_REGISTRY: 'lazypull.io/vpc-registry',
  PULL_USERNAME: 'containerd.io/snapshot/pullusername',
  PULL_SECRET: 'containerd.io/snapshot/pullsecret',
} as const;

export const SupplementParams = {
  /** Metadata (bootstrap) file of the image, consumed by fscache */
  BOOTSTRAP: 'bootstrap',
  /** Cache working directory override */
  WORK_DIR: 'work_dir',
} as const;

export interface SupplementInfo {
  getImageId(): string;
  getSnapshotId(): string;
  isVpcRegistry(): boolean;
  getLabels(): Record<string, string>;
  getParams(): Record<string, string>;
}

export interface SnapshotSupplementInfoInit {
  imageId: string;
  snapshotId: string;
  labels?: Record<string, string>;
  params?: Record<string, string>;
}

/**
 * SupplementInfo of a snapshot request, VPC flag read from its labels
 */
export class SnapshotSupplementInfo implements SupplementInfo {
  private readonly imageId: string;
  private readonly snapshotId: string;
  private readonly labels: Record<string, string>;
  private readonly params: Record<string, string>;

  constructor(init: SnapshotSupplementInfoInit) {
    this.imageId = init.imageId;
    this.snapshotId = init.snapshotId;
    this.labels = { ...init.labels };
    this.params = { ...init.params };
  }

  getImageId(): string {
    return this.imageId;
  }

  getSnapshotId(): string {
    return this.snapshotId;
  }

  isVpcRegistry(): boolean {
    return this.labels[Labels.VPC_REGISTRY] === 'true';
  }

  getLabels(): Record<string, string> {
    return { ...this.labels };
  }

  getParams(): Record<string, string> {
    return { ...this.params };
  }
}

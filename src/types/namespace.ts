export const PciState = {
  UNSPECIFIED: 0,
  DISABLED: 1,
  ENABLED: 2,
  DELETING: 3,
} as const;

export const PciOperState = {
  UNSPECIFIED: 0,
  ONLINE: 1,
  OFFLINE: 2,
} as const;

export type NamespaceSpec = {
  subsystemId: string;  // ex: "subsystems/nqn-1"
  volumeId: string;     // ex: "volumes/v1"; engine bdev is the last segment
  hostNsid: number;     // NSID the host sees, correlation key against the engine
  uuid?: string;
  nguid?: string;
  eui64?: string;      // signed 64-bit value in base 10
};

export type NamespaceStatus = {
  pciState: number;
  pciOperState: number;
};

export type Namespace = {
  name: string;
  spec: NamespaceSpec;
  status?: NamespaceStatus;
};

/** What the engine can tell us about a namespace: only its NSID. */
export type NamespaceSummary = {
  name?: string;
  spec: Pick<NamespaceSpec, 'hostNsid'>;
  status?: NamespaceStatus;
};

export type Subsystem = {
  name: string;  // ex: "subsystems/nqn-1"
  spec: {
    nqn: string; // ex: "nqn.2022-09.io.spdk:opi1"
  };
};

export type VolumeStats = {
  readOpsCount: number;
  writeOpsCount: number;
};

export type NamespaceStats = {
  id: string;
  stats: VolumeStats;
};

export type ListNamespacesResult = {
  namespaces: NamespaceSummary[];
  nextPageToken: string;
};

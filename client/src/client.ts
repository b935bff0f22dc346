import type {
  BulkDataSet,
  Group,
  GroupID,
  KeyType,
  Member,
  MemberID,
  PrivateInfo,
  SensorIndex,
  SensorReference,
} from "@purpleair-client/types";
import type { Logger } from "pino";
import { ApiRequester, DEFAULT_BASE_URL } from "./lib/api.js";
import { CredentialStore, type KeySlot, type RetainedKeys } from "./lib/credentials.js";
import { silentLogger } from "./lib/logger.js";
import type { BulkDataParams, MemberDataParams, SensorDataParams } from "./lib/params.js";
import type { SensorInfo } from "./lib/sensorInfo.js";
import { createFetchTransport, type HttpTransport } from "./lib/transport.js";
import { GroupService } from "./services/groups.js";
import { KeyService } from "./services/keys.js";
import { SensorService } from "./services/sensors.js";

export type PurpleAirClientOptions = {
  baseUrl?: string;
  transport?: HttpTransport;
  logger?: Logger;
  /** Keys retained from the start, without a check against the service. */
  keys?: RetainedKeys;
};

/**
 * Typed access to the PurpleAir REST service. Each method is a single round
 * trip; read calls use the retained read key and write calls the retained
 * write key.
 */
export class PurpleAirClient {
  private readonly credentials: CredentialStore;
  private readonly keys: KeyService;
  private readonly groups: GroupService;
  private readonly sensors: SensorService;

  constructor(options: PurpleAirClientOptions = {}) {
    const logger = options.logger ?? silentLogger();
    this.credentials = new CredentialStore(options.keys);
    const api = new ApiRequester({
      baseUrl: options.baseUrl ?? DEFAULT_BASE_URL,
      transport: options.transport ?? createFetchTransport(),
      credentials: this.credentials,
      logger,
    });
    this.keys = new KeyService(api, this.credentials, logger);
    this.groups = new GroupService(api);
    this.sensors = new SensorService(api);
  }

  hasKey(slot: KeySlot): boolean {
    return this.credentials.has(slot);
  }

  checkKey(key: string): Promise<KeyType> {
    return this.keys.checkKey(key);
  }

  setKey(key: string): Promise<KeyType> {
    return this.keys.setKey(key);
  }

  createGroup(name: string): Promise<GroupID> {
    return this.groups.createGroup(name);
  }

  deleteGroup(groupId: GroupID): Promise<void> {
    return this.groups.deleteGroup(groupId);
  }

  listGroups(): Promise<Group[]> {
    return this.groups.listGroups();
  }

  listGroupMembers(groupId: GroupID): Promise<Member[]> {
    return this.groups.listGroupMembers(groupId);
  }

  addMember(groupId: GroupID, ref: SensorReference, privateInfo?: PrivateInfo): Promise<MemberID> {
    return this.groups.addMember(groupId, ref, privateInfo);
  }

  removeMember(memberId: MemberID, groupId: GroupID): Promise<void> {
    return this.groups.removeMember(memberId, groupId);
  }

  sensorData(sensorIndex: SensorIndex, params?: SensorDataParams): Promise<SensorInfo> {
    return this.sensors.sensorData(sensorIndex, params);
  }

  memberData(groupId: GroupID, memberId: MemberID, params?: MemberDataParams): Promise<SensorInfo> {
    return this.sensors.memberData(groupId, memberId, params);
  }

  sensorsData(params: BulkDataParams): Promise<BulkDataSet> {
    return this.sensors.sensorsData(params);
  }

  membersData(groupId: GroupID, params: BulkDataParams): Promise<BulkDataSet> {
    return this.sensors.membersData(groupId, params);
  }
}

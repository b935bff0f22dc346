import {
  LOCATIONS,
  labelToCode,
  type Group,
  type GroupID,
  type Member,
  type MemberID,
  type PrivateInfo,
  type SensorReference,
} from "@purpleair-client/types";
import type { ApiRequester } from "../lib/api.js";
import {
  GroupCreatedResponse,
  GroupDetailResponse,
  GroupListResponse,
  MemberCreatedResponse,
  decode,
} from "../lib/wire.js";

const WRITE = { slot: "write" } as const;
const READ = { slot: "read" } as const;

function memberBody(ref: SensorReference, privateInfo?: PrivateInfo): Record<string, unknown> {
  const body: Record<string, unknown> = ref.by === "index"
    ? { sensor_index: ref.sensorIndex }
    : { sensor_id: ref.sensorId };
  if (privateInfo) {
    body.owner_email = privateInfo.email;
    body.location_type = labelToCode(LOCATIONS, privateInfo.location);
  }
  return body;
}

export class GroupService {
  private readonly api: ApiRequester;

  constructor(api: ApiRequester) {
    this.api = api;
  }

  async createGroup(name: string): Promise<GroupID> {
    const created = await this.api.sendAndDecode(
      { method: "POST", path: "/groups", expect: 201, key: WRITE, body: { name } },
      (payload) => decode(GroupCreatedResponse, payload, "group creation")
    );
    return created.group_id;
  }

  /** The service refuses to delete a group that still has members. */
  async deleteGroup(groupId: GroupID): Promise<void> {
    await this.api.send({ method: "DELETE", path: `/groups/${groupId}`, expect: 204, key: WRITE });
  }

  async listGroups(): Promise<Group[]> {
    const list = await this.api.sendAndDecode(
      { method: "GET", path: "/groups", expect: 200, key: READ },
      (payload) => decode(GroupListResponse, payload, "group list")
    );
    return list.groups;
  }

  async listGroupMembers(groupId: GroupID): Promise<Member[]> {
    const detail = await this.api.sendAndDecode(
      { method: "GET", path: `/groups/${groupId}`, expect: 200, key: READ },
      (payload) => decode(GroupDetailResponse, payload, "group detail")
    );
    return detail.members;
  }

  /**
   * Adds a sensor to a group. Private sensors need `privateInfo` matching the
   * owner's registration.
   */
  async addMember(groupId: GroupID, ref: SensorReference, privateInfo?: PrivateInfo): Promise<MemberID> {
    const created = await this.api.sendAndDecode(
      {
        method: "POST",
        path: `/groups/${groupId}/members`,
        expect: 201,
        key: WRITE,
        body: memberBody(ref, privateInfo),
      },
      (payload) => decode(MemberCreatedResponse, payload, "member creation")
    );
    return created.member_id;
  }

  async removeMember(memberId: MemberID, groupId: GroupID): Promise<void> {
    await this.api.send({
      method: "DELETE",
      path: `/groups/${groupId}/members/${memberId}`,
      expect: 204,
      key: WRITE,
    });
  }
}

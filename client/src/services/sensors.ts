import type { BulkDataSet, GroupID, MemberID, SensorIndex } from "@purpleair-client/types";
import type { ApiRequester } from "../lib/api.js";
import {
  buildSensorQuery,
  type BulkDataParams,
  type MemberDataParams,
  type SensorDataParams,
} from "../lib/params.js";
import { decodeSensorInfo, type SensorInfo } from "../lib/sensorInfo.js";
import { decodeBulkSensors } from "../lib/transcoder.js";

const READ = { slot: "read" } as const;

export class SensorService {
  private readonly api: ApiRequester;

  constructor(api: ApiRequester) {
    this.api = api;
  }

  /** A `readKey` param is sent as `read_key` and also authenticates this call. */
  async sensorData(sensorIndex: SensorIndex, params?: SensorDataParams): Promise<SensorInfo> {
    const query = buildSensorQuery("sensor", params);
    const readKey = query.get("read_key");
    return this.api.sendAndDecode(
      {
        method: "GET",
        path: `/sensors/${sensorIndex}`,
        expect: 200,
        key: readKey ? { value: readKey } : READ,
        query,
      },
      (payload) => decodeSensorInfo(payload)
    );
  }

  async memberData(groupId: GroupID, memberId: MemberID, params?: MemberDataParams): Promise<SensorInfo> {
    const query = buildSensorQuery("member", params);
    return this.api.sendAndDecode(
      { method: "GET", path: `/groups/${groupId}/members/${memberId}`, expect: 200, key: READ, query },
      (payload) => decodeSensorInfo(payload, "member sensor")
    );
  }

  async sensorsData(params: BulkDataParams): Promise<BulkDataSet> {
    const query = buildSensorQuery("bulk", params);
    return this.api.sendAndDecode(
      { method: "GET", path: "/sensors", expect: 200, key: READ, query },
      (payload) => decodeBulkSensors(payload)
    );
  }

  async membersData(groupId: GroupID, params: BulkDataParams): Promise<BulkDataSet> {
    const query = buildSensorQuery("bulk", params);
    return this.api.sendAndDecode(
      { method: "GET", path: `/groups/${groupId}/members`, expect: 200, key: READ, query },
      (payload) => decodeBulkSensors(payload, "group members")
    );
  }
}

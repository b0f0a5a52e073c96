import type { AgentType } from "../storage/interface";
import type { AgentConfiguration } from "./interface";

const SCHEDULES: Record<AgentType, Pick<AgentConfiguration, "enabledDataTypes" | "dataCollectionIntervalMinutes">> = {
    DomainController: { enabledDataTypes: ["Users", "Groups", "Policies"], dataCollectionIntervalMinutes: 60 },
    Server: { enabledDataTypes: ["Events", "LocalUsers", "LocalGroups"], dataCollectionIntervalMinutes: 30 },
    Workstation: { enabledDataTypes: ["Events", "LocalUsers"], dataCollectionIntervalMinutes: 120 },
};

export function defaultConfiguration(type: AgentType): AgentConfiguration {
    const schedule = SCHEDULES[type];
    return {
        dataCollectionIntervalMinutes: schedule.dataCollectionIntervalMinutes,
        enabledDataTypes: [...schedule.enabledDataTypes],
        heartbeatIntervalSeconds: 300,
        enableDetailedLogging: false,
        customSettings: {},
    };
}

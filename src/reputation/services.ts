// src/reputation/services.ts — Wires the reputation services around one store

import { AnalyticsAggregator } from "./analytics.js"
import { BotConfigService } from "./bot-config.js"
import { UserDirectory } from "./directory.js"
import { EventLog } from "./events.js"
import { InviteTracker } from "./invites.js"
import { VouchLedger } from "./ledger.js"
import type { ReputationStore } from "./store.js"
import { defaultTimeProvider, type TimeProvider } from "../shared/time-provider.js"

export interface ReputationServices {
  store: ReputationStore
  events: EventLog
  ledger: VouchLedger
  directory: UserDirectory
  analytics: AnalyticsAggregator
  invites: InviteTracker
  botConfig: BotConfigService
}

export interface ReputationServicesOptions {
  store: ReputationStore
  adminId: number
  clock?: TimeProvider
}

export function createReputationServices(options: ReputationServicesOptions): ReputationServices {
  const { store } = options
  const clock = options.clock ?? defaultTimeProvider
  const events = new EventLog(clock)
  const ledger = new VouchLedger({ store, clock, events })

  return {
    store,
    events,
    ledger,
    directory: new UserDirectory({ store, ledger, clock, events }),
    analytics: new AnalyticsAggregator(store, clock),
    invites: new InviteTracker({ store, clock, events }),
    botConfig: new BotConfigService({ store, adminId: options.adminId, clock, events }),
  }
}

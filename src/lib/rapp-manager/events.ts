import type {
  InviteCode,
  RappList,
  ServiceSurfaceNames,
  StartRappCode,
  StopRappErrorCode,
  StopTrigger,
} from './types';

export interface RappManagerEventMap {
  'rapp:starting': { name: string };
  'rapp:started': { name: string; runID: string; namespace: string };
  'rapp:start-failed': { name: string; code: StartRappCode; message: string };
  'rapp:stopping': { name: string; runID: string; trigger: StopTrigger };
  'rapp:stopped': {
    name: string;
    runID: string;
    trigger: StopTrigger;
    errorCode: StopRappErrorCode;
  };
  'rapp:stop-failed': {
    name: string;
    runID: string;
    trigger: StopTrigger;
    errorCode: StopRappErrorCode;
    message: string;
  };
  /** The monitor saw the rapp die on its own */
  'rapp:terminated': { name: string; runID: string };
  'controller:granted': { remote: string; namespace: string };
  'controller:released': { remote: string };
  'invite:refused': { remote: string; code: InviteCode; reason?: string };
  'surface:bound': { base: string; names: ServiceSurfaceNames };
  'feed:installed-rapps': RappList;
  'feed:runnable-rapps': RappList;
}

/**
 * Events the lifecycle controller emits, re-emitted by the manager
 */
export type RappLifecycleEventMap = Pick<
  RappManagerEventMap,
  | 'rapp:starting'
  | 'rapp:started'
  | 'rapp:start-failed'
  | 'rapp:stopping'
  | 'rapp:stopped'
  | 'rapp:stop-failed'
  | 'rapp:terminated'
>;

/**
 * Events the control arbiter emits, re-emitted by the manager
 */
export type ControlArbiterEventMap = Pick<
  RappManagerEventMap,
  'controller:granted' | 'controller:released' | 'invite:refused'
>;

/**
 * Event and chunk shapes exchanged between the primary server and the workers.
 */

export interface Particle {
  /** PDG particle code */
  pdg: number;
  px: number;
  py: number;
  pz: number;
  /** Total energy (GeV) */
  e: number;
  vx: number;
  vy: number;
  vz: number;
  /** Production time (ns) */
  t: number;
}

export interface Vertex {
  x: number;
  y: number;
  z: number;
}

/** Summary record of one generated event. */
export interface EventHeader {
  generator: string;
  trigger: string;
  nPrimaries: number;
  vertex: Vertex;
  /** Generation attempts the trigger needed to accept this event */
  trials: number;
  /** Index of the background event this one was embedded into */
  embeddedEventIndex?: number;
}

export interface PrimaryEvent {
  header: EventHeader;
  particles: readonly Particle[];
}

export interface SubEventInfo {
  /** 1-based event ordinal, or EXHAUSTED_EVENT_ID on the terminal chunk */
  eventId: number;
  maxEvents: number;
  /** 1-based part number within the event */
  part: number;
  nparts: number;
  seed: number;
  /** Offset of the first particle of this part in the event's particle list */
  index: number;
  header: EventHeader;
}

export interface PrimaryChunk {
  info: SubEventInfo;
  particles: Particle[];
}

export const EXHAUSTED_EVENT_ID = -1;

/** No particles and ordinal -1: the server will never produce more work. */
export function isExhaustionSignal(chunk: PrimaryChunk): boolean {
  return chunk.particles.length === 0 && chunk.info.eventId === EXHAUSTED_EVENT_ID;
}

export function emptyEventHeader(): EventHeader {
  return {
    generator: '',
    trigger: '',
    nPrimaries: 0,
    vertex: { x: 0, y: 0, z: 0 },
    trials: 0,
  };
}

export function emptyEvent(): PrimaryEvent {
  return { header: emptyEventHeader(), particles: [] };
}

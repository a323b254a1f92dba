export {
  BAD_BIT_MIN_US,
  Dht22,
  Dht22Decoder,
  type Dht22EventMap,
  type Dht22Host,
  type Dht22Options,
  type Dht22Reading,
  type FrameResult,
  ONE_BIT_MIN_US,
  STALE_FRAME_US,
} from "./dht22.ts";
export {
  DigitalOutput,
  Led,
  type OutputHost,
  Switch,
} from "./digital-output.ts";
export {
  computeConcentration,
  Dsm501a,
  type Dsm501aHost,
  type Dsm501aOptions,
  type LevelChange,
  lowPulseMicros,
} from "./dsm501a.ts";
export {
  MH_Z14_BAUD,
  MH_Z14_FRAME_SIZE,
  MhZ14,
  type MhZ14Host,
  type MhZ14Options,
  mhZ14Checksum,
  parseCo2Response,
  readCo2Command,
} from "./mh-z14.ts";

// ---------------------------------------------------------------------------
// @axis-sim/motion-core: Simulation Types
// ---------------------------------------------------------------------------

// ---------------------------------------------------------------------------
// Discrete time
// ---------------------------------------------------------------------------

/** One simulation instant. `elapsedS` is always `index * dt`. */
export interface TimeStep {
  index: number;
  elapsedS: number;
}

/** Sequencer parameters (seconds). */
export interface DiscreteTimeConfig {
  /** Step interval, must be > 0. */
  deltaTS: number;
  /** Total simulated time, must be >= deltaTS. */
  durationS: number;
}

/** Lazy, finite, restartable sequence of time steps. */
export interface DiscreteTime extends Iterable<TimeStep> {
  readonly dt: number;
  readonly durationS: number;
  /** Number of steps the sequence yields: floor(duration / dt) + 1. */
  readonly stepCount: number;
  /** A fresh iterator starting at index 0. */
  steps(): IterableIterator<TimeStep>;
}

// ---------------------------------------------------------------------------
// Motion profile
// ---------------------------------------------------------------------------

/** Commanded velocity and position at one instant. */
export interface MotionCommand {
  readonly cmdVel: number;
  readonly cmdPos: number;
}

export type ProfilePhase = 'accel' | 'cruise' | 'decel' | 'hold';

export type ProfileType = 'trapezoidal' | 'impulse';

/** Pure mapping from elapsed time to command. */
export interface MotionProfile {
  readonly type: ProfileType;
  commandAt(elapsedS: number): MotionCommand;
}

export interface TrapezoidalProfileConfig {
  /** Cruise velocity (m/s), > 0. */
  maxVelocity: number;
  /** Acceleration magnitude (m/s^2), > 0, used for both ramps. */
  acceleration: number;
  /** Move distance (m), > 0. */
  distance: number;
}

export interface TrapezoidalProfile extends MotionProfile {
  readonly type: 'trapezoidal';
  /** `triangular` when the move is too short to reach `maxVelocity`. */
  readonly shape: 'trapezoidal' | 'triangular';
  readonly maxVelocity: number;
  readonly acceleration: number;
  readonly distance: number;
  /** Highest commanded velocity: maxVelocity, or sqrt(a*d) when triangular. */
  readonly peakVelocity: number;
  /** Duration of each ramp (s). */
  readonly accelTimeS: number;
  /** Duration of the constant-velocity phase (s), 0 when triangular. */
  readonly cruiseTimeS: number;
  /** Time at which the profile reaches and holds `distance` (s). */
  readonly totalTimeS: number;
  phaseAt(elapsedS: number): ProfilePhase;
}

export interface ImpulseProfileConfig {
  velocity: number;
  position: number;
  /** Pulse width (s), > 0. */
  widthS: number;
}

export interface ImpulseProfile extends MotionProfile {
  readonly type: 'impulse';
  readonly widthS: number;
}

// ---------------------------------------------------------------------------
// Controllers
// ---------------------------------------------------------------------------

/** Measured plant feedback fed to a controller. */
export interface Measurement {
  readonly measVel: number;
  readonly measPos: number;
}

/** Everything a controller sees on one tick. */
export interface ControlInput {
  timeS: number;
  command: MotionCommand;
  measured: Measurement;
  dt: number;
}

export type ControllerType = 'pid' | 'step' | 'impulse';

export interface Controller {
  readonly type: ControllerType;
  calculateForce(input: ControlInput): number;
  /** Return to the freshly constructed state. */
  reset(): void;
}

/** Velocity-loop and position-loop gains. Any finite value is accepted. */
export interface PidGains {
  kvp: number;
  kvi: number;
  kvd: number;
  kpp: number;
  kpi: number;
  kpd: number;
}

/** Internal memory of a PID controller. */
export interface ControllerState {
  readonly integralVel: number;
  readonly integralPos: number;
  readonly prevErrorVel: number;
  readonly prevErrorPos: number;
}

export interface PidController extends Controller {
  readonly type: 'pid';
  readonly gains: Readonly<PidGains>;
  state(): ControllerState;
}

export interface StepControllerConfig {
  force: number;
  /** Force is 0 while timeS < delayS. */
  delayS: number;
}

export interface ImpulseControllerConfig {
  force: number;
  /** Number of consecutive ticks the force is applied. */
  onSteps: number;
  delayS: number;
}

// ---------------------------------------------------------------------------
// Plants
// ---------------------------------------------------------------------------

export interface KinematicState {
  readonly acc: number;
  readonly vel: number;
  readonly pos: number;
}

export interface PlantState extends KinematicState {
  readonly mass: number;
}

export type PlantType = 'point_mass' | 'mass_damper_spring';

export interface Plant {
  readonly type: PlantType;
  readonly mass: number;
  state(): PlantState;
  /** Integrate `force` over `dt`; returns the updated kinematic state. */
  applyForce(force: number, dt: number): KinematicState;
  /** Zero acc/vel/pos; mass unchanged. */
  reset(): void;
  /** Override part of the kinematic state, e.g. for initial conditions. */
  setState(state: Partial<KinematicState>): void;
}

export interface PointMassConfig {
  /** kg, > 0. */
  mass: number;
}

export interface MassDamperSpringConfig {
  mass: number;
  /** Viscous damping coefficient (N*s/m), >= 0. */
  damper: number;
  /** Spring rate (N/m), >= 0. */
  spring: number;
  /** Spring rest position (m). */
  springBalancePos: number;
}

/** Force breakdown of the most recent mass-damper-spring update. */
export interface SpringDamperForces {
  readonly damperForce: number;
  readonly springForce: number;
  readonly netForce: number;
}

export interface MassDamperSpring extends Plant {
  readonly type: 'mass_damper_spring';
  readonly damper: number;
  readonly spring: number;
  readonly springBalancePos: number;
  forces(): SpringDamperForces;
}

// ---------------------------------------------------------------------------
// Motion flow
// ---------------------------------------------------------------------------

/** One row of the output time series. Frozen once created. */
export interface SimulationRecord {
  readonly step: number;
  readonly timeS: number;
  readonly cmdVel: number;
  readonly cmdPos: number;
  readonly objAcc: number;
  readonly objVel: number;
  readonly objPos: number;
  readonly force: number;
  /** `cmdVel` minus the velocity the controller was fed. */
  readonly errVel: number;
  /** `cmdPos` minus the position the controller was fed. */
  readonly errPos: number;
  /** Force breakdown, present only when the plant is a mass-damper-spring. */
  readonly damperForce?: number;
  readonly springForce?: number;
  readonly netForce?: number;
}

export interface MotionFlowComponents {
  time: DiscreteTime;
  profile: MotionProfile;
  controller: Controller;
  plant: Plant;
}

export interface ExecuteOptions {
  /** Checked between ticks; an aborted run returns the completed prefix. */
  signal?: AbortSignal;
}

export { configVersionSchema } from './version'

export {
  discreteTimeConfigSchema,
  type DiscreteTimeConfigInput,
} from './discrete-time'

export {
  trapezoidalProfileConfigSchema,
  impulseProfileConfigSchema,
  motionProfileConfigSchema,
  type TrapezoidalProfileConfigInput,
  type ImpulseProfileConfigInput,
  type MotionProfileConfigInput,
} from './motion-profile'

export {
  pidControllerConfigSchema,
  stepControllerConfigSchema,
  impulseControllerConfigSchema,
  controllerConfigSchema,
  type PidControllerConfigInput,
  type StepControllerConfigInput,
  type ImpulseControllerConfigInput,
  type ControllerConfigInput,
} from './controller'

export {
  pointMassConfigSchema,
  massDamperSpringConfigSchema,
  plantConfigSchema,
  type PointMassConfigInput,
  type MassDamperSpringConfigInput,
  type PlantConfigInput,
} from './plant'

export {
  simulationConfigSchema,
  type SimulationConfigInput,
} from './simulation'

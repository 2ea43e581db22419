// Versioned configuration records shared by loaders and the simulation core.
export * from './schemas/index'

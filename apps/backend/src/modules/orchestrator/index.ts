export {
    OrchestratorModule,
    type IBuiltinPlugin,
    type IOrchestratorComponents,
    type IOrchestratorDependencies,
    type IOrchestratorRepositories,
    type IOrchestratorSettings
} from './OrchestratorModule.js';

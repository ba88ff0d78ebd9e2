import { setupPulumiMocks } from './utils/testing.ts'

// Mocks must be in place before any module constructs a Config or a resource.
await setupPulumiMocks()

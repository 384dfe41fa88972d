/**
 * Fixture file storage.
 */

export {
  FIXTURE_EXTENSION,
  FixtureError,
  getFixturePath,
  saveFixture,
  readFixtureText,
  loadFixture,
  verifyFixture,
  firstDifference,
  listFixtures,
  type VerifyResult,
} from "./store.js";

export {
  createFakeGitHub,
  type FakeCommit,
  type FakeGitHub,
  type FakeGitHubOptions,
} from "./fake-github.js";

export {
  createFakeClipSource,
  fakeCamera,
  fakeClip,
  type FakeClip,
  type FakeClipSource,
  type FakeClipSourceOptions,
} from "./source.js";

export default ["packages/core", "apps/cli"];

import { ProvisionProfileSchema, type ProvisionProfile } from "../schema.js";

export const KEY_URL = "https://packages.example.test/gpg";

/** Raw JSON for a small two-family profile. */
export function profileInput() {
  return {
    name: "example-runtime",
    description: "Example runtime for tests",
    keyName: "example",
    platforms: {
      debianLike: {
        codenames: ["noble", "jammy"],
        packages: {
          conflicting: ["old-runtime"],
          prerequisites: ["ca-certificates"],
          runtime: ["example-runtime", "example-cli"],
        },
        trust: { keyUrl: KEY_URL },
        repository: { url: "https://packages.example.test/apt" },
      },
      rhelLike: {
        codenames: ["9"],
        packages: { runtime: ["example-runtime"] },
        trust: { keyUrl: KEY_URL },
        repository: {
          url: "https://packages.example.test/rpm/{codename}/{arch}",
          label: "Example Stable",
        },
      },
    },
    verify: {
      smokeTest: ["example", "run", "probe"],
      versionProbe: ["example", "--version"],
    },
  };
}

export function testProfile(): ProvisionProfile {
  return ProvisionProfileSchema.parse(profileInput());
}

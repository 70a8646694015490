import type { RevealPolicy } from "../reveal-policy"

export type RevealPolicyHarness = {
  name: string
  make: (enabled: boolean) => RevealPolicy
}

export function describeRevealPolicyContract(h: RevealPolicyHarness) {
  describe(`${h.name} (RevealPolicy contract)`, () => {
    it("reports the mode it was created with", () => {
      expect(h.make(true).isDebugMode()).toBe(true)
      expect(h.make(false).isDebugMode()).toBe(false)
    })

    it("answers consistently while nothing changes it", () => {
      const policy = h.make(true)

      expect([policy.isDebugMode(), policy.isDebugMode(), policy.isDebugMode()]).toEqual([
        true,
        true,
        true,
      ])
    })
  })
}

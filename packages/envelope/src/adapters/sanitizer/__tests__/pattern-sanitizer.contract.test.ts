import { describeSanitizerContract } from "../../../ports/__tests__/sanitizer.contract"
import { createSanitizer, PatternSanitizer } from "../pattern-sanitizer"

describeSanitizerContract({
  name: "PatternSanitizer",
  make: () => new PatternSanitizer(),
  sensitive: {
    input: "user=sam&password=hunter2",
    expected: "user=sam&password=********",
  },
})

describeSanitizerContract({
  name: "PatternSanitizer with custom keys",
  make: () => createSanitizer({ keys: ["session_id"], mask: "[redacted]" }),
  sensitive: {
    input: "session_id=s-42, page=3",
    expected: "session_id=[redacted], page=3",
  },
})

import { mapCodec } from "../map-codec"
import { describeCodecContract } from "./codec.contract"

describeCodecContract({
  codec: mapCodec,
  samples: [
    [new Map(), { $t: "map", v: [] }],
    [
      new Map<unknown, unknown>([
        [1, "one"],
        [{ k: 1 }, "obj"],
      ]),
      {
        $t: "map",
        v: [
          [1, "one"],
          [{ k: 1 }, "obj"],
        ],
      },
    ],
  ],
  invalid: [
    { $t: "map", v: [[1]] },
    { $t: "map", v: {} },
  ],
})

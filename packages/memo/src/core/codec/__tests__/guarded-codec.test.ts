import { mock } from "vitest-mock-extended"
import type { Codec } from "../../../ports/codec"
import type { Mock } from "../../../tests/utils/mock"
import { thrownBy } from "../../../tests/utils/thrown-by"
import { DecodingError, EncodingError } from "../../errors"
import { decodeValue, encodeValue } from "../guarded-codec"

describe("guarded codec calls", () => {
  let codec: Mock<Codec<string>>

  beforeEach(() => {
    codec = mock<Codec<string>>()
  })

  it("passes results through", () => {
    codec.encode.mockReturnValue(new Uint8Array([1]))
    codec.decode.mockReturnValue("decoded")

    expect(encodeValue(codec, "k", "v")).toStrictEqual(new Uint8Array([1]))
    expect(decodeValue(codec, "k", new Uint8Array([1]))).toBe("decoded")
    expect(codec.encode).toHaveBeenCalledExactlyOnceWith("v")
  })

  it("wraps encode failures in EncodingError with the cause", () => {
    const cause = new TypeError("circular")
    codec.encode.mockImplementation(() => {
      throw cause
    })

    const err = thrownBy(() => encodeValue(codec, "users:1", "v"))

    expect(err).toBeInstanceOf(EncodingError)
    expect(err).toMatchObject({ code: "encoding_error", cause })
  })

  it("wraps decode failures in DecodingError with the key", () => {
    codec.decode.mockImplementation(() => {
      throw new SyntaxError("bad json")
    })

    const err = thrownBy(() => decodeValue(codec, "users:1", new Uint8Array()))

    expect(err).toBeInstanceOf(DecodingError)
    expect(err).toMatchObject({
      name: "DecodingError",
      code: "decoding_error",
      context: { key: "users:1" },
    })
  })
})

import React, { useState } from "react"
import { Box, Text, render } from "ink"
import TextInput from "ink-text-input"
import { VaultAuthError } from "../errors.js"

export interface UnlockPromptProps {
  readonly vaultPath: string
  readonly attempt: number
  readonly maxAttempts: number
  /** Shown above the input after a failed attempt. */
  readonly error: string | null
  readonly onSubmit: (password: string) => void
}

export const UnlockPrompt = ({ vaultPath, attempt, maxAttempts, error, onSubmit }: UnlockPromptProps) => {
  const [value, setValue] = useState("")
  const label = attempt > 1 ? `Password (attempt ${attempt} of ${maxAttempts}): ` : "Password: "
  return (
    <Box flexDirection="column">
      <Text>
        Unlock <Text bold>{vaultPath}</Text>
      </Text>
      {error ? <Text color="red">{error}</Text> : null}
      <Box>
        <Text>{label}</Text>
        <TextInput value={value} onChange={setValue} mask="*" onSubmit={onSubmit} />
      </Box>
    </Box>
  )
}

export type PasswordPrompt = (options: Omit<UnlockPromptProps, "onSubmit">) => Promise<string>

/** Renders the prompt until Enter; Ctrl+C rejects with a VaultAuthError. */
export const promptForPassword: PasswordPrompt = (options) =>
  new Promise((resolve, reject) => {
    let submitted = false
    const instance = render(
      <UnlockPrompt
        {...options}
        onSubmit={(password) => {
          submitted = true
          instance.unmount()
          resolve(password)
        }}
      />,
      { exitOnCtrlC: true },
    )
    instance
      .waitUntilExit()
      .then(() => {
        if (!submitted) reject(new VaultAuthError("Unlock cancelled"))
      })
      .catch(reject)
  })

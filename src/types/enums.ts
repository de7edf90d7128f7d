export enum PromptType {
  Input = "input",
  Confirm = "confirm",
}

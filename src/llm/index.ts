export {
  AnthropicCompleter,
  type TextCompleter,
  type CompletionRequest,
  type ChatTurn,
} from "./completer.js";

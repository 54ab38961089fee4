import { Toaster } from "@/components/ui/sonner";
import WatershedWorkspace from "./pages/WatershedWorkspace";

const App = () => (
  <>
    <Toaster richColors position="top-right" />
    <WatershedWorkspace />
  </>
);

export default App;

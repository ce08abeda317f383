import { Body, Controller, Get, Header, HttpCode, Post } from "@nestjs/common";
import { ApiExcludeController } from "@nestjs/swagger";
import { BaseController } from "@/common/base/base.controller";
import { InputError } from "@/common/errors";
import { LookupFormDto } from "@/controllers/dto/lookup.dto";
import { LookupService } from "@/lookup/lookup.service";
import { TranslationChainService } from "@/translation/translation-chain.service";
import { renderLookupPage, type LookupPageModel } from "./lookup-page.renderer";

/**
 * HTML form front end over the lookup service
 */
@ApiExcludeController()
@Controller()
export class LookupPageController extends BaseController {
  constructor(
    private readonly lookupService: LookupService,
    private readonly translationChain: TranslationChainService
  ) {
    super();
  }

  @Get()
  @Header("Content-Type", "text/html; charset=utf-8")
  showForm(): string {
    return renderLookupPage({
      text: "",
      mode: "single",
      includeTones: true,
      detailedAnalysis: false,
      bypassCache: false,
      providers: this.translationChain.getProviderNames(),
    });
  }

  @Post()
  @HttpCode(200)
  @Header("Content-Type", "text/html; charset=utf-8")
  async submitForm(@Body() form: LookupFormDto): Promise<string> {
    const model: LookupPageModel = {
      text: form.text ?? "",
      mode: form.mode ?? "single",
      // Unchecked boxes are not posted
      includeTones: form.includeTones === true,
      detailedAnalysis: form.detailedAnalysis === true,
      bypassCache: form.bypassCache === true,
      providers: this.translationChain.getProviderNames(),
    };
    const options = {
      includeTones: model.includeTones,
      detailedAnalysis: model.detailedAnalysis,
      bypassCache: model.bypassCache,
    };

    try {
      if (model.mode === "batch") {
        const texts = this.lookupService.parseBatchInput(model.text);
        if (texts.length === 0) {
          throw new InputError("Enter at least one line of text");
        }
        model.results = await this.lookupService.lookupBatch(texts, options);
      } else {
        model.results = [await this.lookupService.lookup(model.text, options)];
      }
    } catch (error) {
      if (!(error instanceof InputError)) {
        throw error;
      }
      model.error = error.message;
    }

    return renderLookupPage(model);
  }
}
